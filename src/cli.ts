import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { loadConfig } from './config/app.js';
import { ConfigurationError } from './core/errors.js';
import { createPipelineDeps } from './core/deps.js';
import { handleChat } from './core/assistant.js';
import { formatCitationList } from './core/citations.js';
import { createLogger } from './util/logging.js';
import type { ChatOutputT } from './schemas/chat.js';
import type { PipelineDeps } from './core/graph.js';

const log = createLogger(process.env.LOG_LEVEL ?? 'error');

const FRAME_BAR = '─'.repeat(44);

type Styler = (value: string) => string;

const identity: Styler = (value: string) => value;

interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  const prefixed = lines.map((line) => `${accent('│')} ${body(line)}`).join('\n');
  return {
    top: accent(topPlain),
    body: prefixed,
    bottom: accent(bottomPlain),
  };
}

// Citation markers stand out in the terminal.
function highlightMarkers(text: string): string {
  return text.replace(/\[(\d+)\]/g, (_m, n: string) => chalk.cyan(`[${n}]`));
}

function renderAnswer(out: ChatOutputT): string {
  const parts = [highlightMarkers(out.reply)];
  if (out.citations.length > 0) {
    parts.push('', chalk.bold('Sources'), ...formatCitationList(out.citations).map((l) => chalk.gray(l)));
  }
  if (out.error) parts.push('', chalk.red(`error: ${out.error}`));
  return parts.join('\n');
}

function printBlock(block: BlockParts) {
  console.log();
  console.log(block.top);
  if (block.body.length > 0) console.log(block.body);
  console.log(block.bottom);
}

async function main() {
  let deps: PipelineDeps;
  try {
    deps = createPipelineDeps(loadConfig(), log);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(chalk.red(err.message));
      process.exit(1);
    }
    throw err;
  }

  const rl = readline.createInterface({ input, output });

  console.log(chalk.yellow.bold('Shopping search: ask for any product, e.g. "stainless steel cleaner under $15"'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.gray(`Sources: catalog ${deps.catalog ? 'on' : 'off'}, web ${deps.web ? 'on' : 'off'}`));
  console.log(chalk.red('exit (quit)'));
  console.log();

  while (true) {
    const q = await rl.question(chalk.blue.bold('You> '));
    if (q.trim().toLowerCase() === 'exit') break;
    if (!q.trim()) continue;

    printBlock(createBlock('You', q, chalk.blueBright, chalk.white));

    let res: ChatOutputT | null = null;
    try {
      res = await handleChat({ message: q }, { deps });
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      console.log(chalk.red(`Error processing request: ${details}`));
    }
    if (!res) continue;

    printBlock(createBlock('Assistant', renderAnswer(res), chalk.greenBright, identity));
    console.log();
  }
  rl.close();
}

main().catch((e) => (console.error(e), process.exit(1)));
