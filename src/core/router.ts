import { ClassifierOutput } from '../schemas/router.js';
import type { Intent, IntentType } from '../schemas/product.js';
import { detectCategory } from './planner.js';
import { fillPrompt, getPrompt } from './prompts.js';
import { safeExtractJson, type TextGenerator } from './llm.js';
import type { ConversationState, ConversationUpdate } from './state.js';
import type { Logger } from '../util/logging.js';

export const SCOPE_DECLINATION =
  "I can only help with shopping questions, like finding or comparing products and prices. Try asking about something you'd like to buy.";

// Deterministic safety lexicon; flags are informational except prohibited_item.
const SAFETY_LEXICON: Record<string, RegExp> = {
  prohibited_item:
    /\b(?:guns?|firearms?|ammo|ammunition|explosives?|grenades?|cocaine|heroin|meth(?:amphetamine)?|fentanyl|counterfeit|fake (?:ids?|passports?)|stolen)\b/i,
  adult: /\b(?:porn\w*|xxx|sex toys?|adult toys?|lingerie|nsfw)\b/i,
  medical: /\b(?:prescription|rx|antibiotics?|opioids?|insulin|diagnos\w*|dosage|medication)\b/i,
  personal_data: /\b(?:ssn|social security|credit card numbers?|passwords?|home address|phone numbers? of)\b/i,
  minor_safety: /\b(?:for (?:my )?(?:kid|child|toddler|baby|infant)s?|under \d+ (?:months|years)|choking hazard)\b/i,
};

const SHOPPING_RE =
  /\b(?:buy|purchase|shop\w*|price[sd]?|cheap\w*|under|budget|deal|deals|sale|order|recommend\w*|best|compare|product|products|brand|coupons?|promo|amazon|walmart|target|cost|\$\d)/i;

// Generic item nouns that carry no category of their own.
const PRODUCT_NOUN_RE =
  /\b(?:books?|workbooks?|sets?|kits?|vacuums?|gifts?|tools?|supplies|gear|accessories|bundle|pack)\b/i;

// Phrases, not single words: "recipe", "story" or "code" alone also name products.
const OFF_TOPIC_RE =
  /\b(?:weather|forecast|news|headlines|jokes?|poems?|poetry|lyrics|capital of|who (?:is|was)|what year|history of|translate|tell me a story|write (?:me )?(?:a |an )?(?:story|essay)|recipe for|how (?:do i|to) cook|write (?:some |me )?code|debug|homework|solve|stock market|election|sports? scores?|movie times)\b/i;

const GREETING_RE = /^(?:hi|hello|hey|yo|hiya|good (?:morning|afternoon|evening)|help|thanks|thank you)[\s!.?]*$/i;

export function detectSafetyFlags(query: string): string[] {
  return Object.entries(SAFETY_LEXICON)
    .filter(([, re]) => re.test(query))
    .map(([flag]) => flag);
}

export function heuristicIntentType(query: string): IntentType {
  const q = query.trim();
  if (!q || GREETING_RE.test(q)) return 'clarification';
  const productSignal = SHOPPING_RE.test(q) || PRODUCT_NOUN_RE.test(q) || detectCategory(q) !== undefined;
  if (OFF_TOPIC_RE.test(q) && !productSignal) return 'out_of_scope';
  return 'product_query';
}

export interface IntentClassifier {
  classify(query: string, signal?: AbortSignal): Promise<{ type: IntentType; safetyFlags: string[] }>;
}

/**
 * Scope classifier backed by an LLM returning strict JSON. Any failure
 * (transport, empty prompt, schema mismatch) rejects; the router decides
 * how to fall back.
 */
export class LlmIntentClassifier implements IntentClassifier {
  constructor(private readonly llm: TextGenerator) {}

  async classify(query: string, signal?: AbortSignal): Promise<{ type: IntentType; safetyFlags: string[] }> {
    const tmpl = await getPrompt('router_classifier');
    if (!tmpl) throw new Error('router_classifier prompt unavailable');
    const raw = await this.llm.complete(fillPrompt(tmpl, { query }), { json: true, signal });
    const parsed = ClassifierOutput.safeParse(safeExtractJson(raw));
    if (!parsed.success) throw new Error('classifier returned invalid JSON');
    return { type: parsed.data.type, safetyFlags: parsed.data.safety_flags };
  }
}

export type RouterDeps = {
  classifier?: IntentClassifier;
  log: Logger;
  signal?: AbortSignal;
};

/**
 * Classifies the query. Out-of-scope queries get a declination answer here and
 * the graph ends after this node.
 */
export async function routeQuery(state: ConversationState, deps: RouterDeps): Promise<ConversationUpdate> {
  const query = state.query.trim();
  const flags = new Set(detectSafetyFlags(query));
  const notes: string[] = [];
  let type: IntentType;

  if (!query) {
    type = 'clarification';
  } else if (deps.classifier) {
    try {
      const out = await deps.classifier.classify(query, deps.signal);
      type = out.type;
      out.safetyFlags.forEach((f) => flags.add(f));
    } catch (err) {
      if (deps.signal?.aborted) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      deps.log.warn({ reason }, 'intent classifier failed; treating as product query');
      notes.push(`router: classifier failed (${reason}); defaulting to product_query`);
      type = 'product_query';
    }
  } else {
    type = heuristicIntentType(query);
  }

  if (flags.has('prohibited_item')) type = 'out_of_scope';

  const intent: Intent = { type, safetyFlags: [...flags] };
  const line = `router: intent=${type}${intent.safetyFlags.length ? ` flags=${intent.safetyFlags.join(',')}` : ''}`;
  deps.log.debug({ intent }, 'query routed');

  if (type === 'out_of_scope') {
    return {
      intent,
      reconciledResults: [],
      citations: [],
      finalAnswer: { summary: SCOPE_DECLINATION },
      log: [...notes, line, 'router: out of scope, ending'],
    };
  }
  return { intent, log: [...notes, line] };
}
