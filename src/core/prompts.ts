import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName = 'router_classifier' | 'answer_explainer';

const FILES: Record<PromptName, string> = {
  router_classifier: 'router_classifier.md',
  answer_explainer: 'answer_explainer.md',
};

const memo = new Map<PromptName, string>();

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

/**
 * Loads a prompt template from the prompts directory. Missing files resolve to
 * an empty string; callers treat that as "LLM step unavailable".
 */
export async function getPrompt(name: PromptName): Promise<string> {
  const cached = memo.get(name);
  if (cached !== undefined) return cached;
  let text = '';
  try {
    text = await readFile(path.join(promptsDir(), FILES[name]), 'utf-8');
  } catch {
    text = '';
  }
  memo.set(name, text);
  return text;
}

export function fillPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (whole, key: string) => vars[key] ?? whole);
}
