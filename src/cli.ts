#!/usr/bin/env node
/**
 * Swear Filter Test CLI
 *
 * Usage:
 *   npx tsx src/cli.ts "your text here"
 *   npx tsx src/cli.ts --terms "fuck, shit" "text to check"
 *   npx tsx src/cli.ts --interactive
 *
 * Reads .env; SWEAR_FILTER_TERMS sets the default term list.
 */

import 'dotenv/config';
import { loadConfigFromEnv } from './config';
import { SwearFilter } from './filter';
import { normalizer } from './normalizer';
import { phoneticKey } from './phonetic';
import type { FilterVerdict } from './types';
import { splitWords } from './words';

export const FALLBACK_TERMS = ['fuck', 'shit', 'damn'];

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function colorize(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export interface CliOptions {
  terms?: string[];
  interactive: boolean;
  debug: boolean;
  help: boolean;
  text: string;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { interactive: false, debug: false, help: false, text: '' };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--terms':
      case '-t': {
        const list = argv[i + 1];
        if (list === undefined) {
          throw new Error(`${arg} needs a comma or space separated list`);
        }
        options.terms = splitWords(list);
        i++;
        break;
      }
      case '--interactive':
      case '-i':
        options.interactive = true;
        break;
      case '--debug':
      case '-d':
        options.debug = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        words.push(arg);
    }
  }

  options.text = words.join(' ');
  return options;
}

export function resolveTerms(options: CliOptions, env: NodeJS.ProcessEnv = process.env): string[] {
  if (options.terms && options.terms.length > 0) return options.terms;
  const fromEnv = env.SWEAR_FILTER_TERMS ? splitWords(env.SWEAR_FILTER_TERMS) : [];
  return fromEnv.length > 0 ? fromEnv : FALLBACK_TERMS;
}

// =============================================================================
// OUTPUT
// =============================================================================

function printNormalization(text: string): void {
  console.log(colorize('\n📝 NORMALIZATION:', 'cyan'));
  console.log(`   Original:     "${text}"`);
  console.log(`   Preprocessed: "${normalizer.preprocess(text)}"`);
  console.log(`   Folded:       "${normalizer.foldToBase(text)}"`);
  console.log(`   Phonetic key: "${phoneticKey(normalizer.preprocess(text))}"`);
  if (normalizer.hasObfuscation(text)) {
    console.log(colorize('   ⚠️  Obfuscation detected!', 'yellow'));
  }

  const changes = normalizer.debugNormalization(text);
  for (const change of changes) {
    console.log(`   [${change.position}] ${change.original} (${change.codePoint}) → ${change.normalized}`);
  }
}

function printVerdict(verdict: FilterVerdict): void {
  const status = verdict.blocked
    ? colorize('⛔ BLOCKED', 'red')
    : colorize('✅ CLEAN', 'green');
  console.log(`\n   Status: ${status}`);
  console.log(`   Stage:  ${verdict.stage}`);
  if (verdict.term) console.log(`   Term:   ${verdict.term}`);
  if (verdict.token) console.log(`   Token:  ${verdict.token}`);
  if (verdict.span) {
    console.log(`   Found:  "${verdict.span.original}" at ${verdict.span.start}-${verdict.span.end}`);
  }
}

async function checkText(text: string, filter: SwearFilter, debug: boolean): Promise<void> {
  console.log('\n' + '='.repeat(70));
  console.log(colorize('INPUT:', 'bright'), text);
  console.log('='.repeat(70));

  if (debug) printNormalization(text);

  const started = performance.now();
  const blocked = await filter.containsBannedTerm(text);
  const elapsed = performance.now() - started;

  const verdict = filter.inspect(text);
  if (verdict.blocked !== blocked) {
    console.log(colorize('   (cached verdict differs from a fresh run)', 'yellow'));
  }
  printVerdict(verdict);
  console.log(colorize('\n⏱️  Processing time:', 'dim'), `${elapsed.toFixed(2)}ms`);
}

async function interactiveMode(filter: SwearFilter, debug: boolean): Promise<void> {
  const readline = await import('readline');
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(colorize('\n🔬 SWEAR FILTER TEST CLI', 'bright'));
  console.log(colorize('='.repeat(40), 'dim'));
  console.log(`Banned terms: ${filter.terms.join(', ')}`);
  console.log('Enter text to check (or "quit" to exit)\n');

  rl.setPrompt(colorize('> ', 'cyan'));
  rl.prompt();

  for await (const input of rl) {
    const command = input.trim().toLowerCase();
    if (command === 'quit' || command === 'exit') break;

    if (command === 'stats') {
      console.log(filter.getStats());
    } else if (input.trim()) {
      await checkText(input, filter, debug);
    }
    rl.prompt();
  }

  console.log('Goodbye!');
  rl.close();
}

function printUsage(): void {
  console.log(`
${colorize('SWEAR FILTER TEST CLI', 'bright')}

${colorize('Usage:', 'cyan')}
  npx tsx src/cli.ts "text to check"
  npx tsx src/cli.ts --terms "word1, word2" "text to check"
  npx tsx src/cli.ts --interactive [--debug]

${colorize('Options:', 'cyan')}
  -t, --terms <list>   banned terms, comma or space separated
  -i, --interactive    read messages line by line ("stats", "quit")
  -d, --debug          show normalization details
  -h, --help           this text

${colorize('Environment:', 'cyan')}
  SWEAR_FILTER_TERMS, SWEAR_FILTER_CACHE_SIZE, SWEAR_FILTER_MAX_VARIANTS,
  SWEAR_FILTER_SUFFIX_RULES, SWEAR_FILTER_SAFE_WORDS_PATH
`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help || (!options.interactive && !options.text)) {
    printUsage();
    return;
  }

  const terms = resolveTerms(options);
  const filter = new SwearFilter(terms, loadConfigFromEnv(process.env, terms));

  if (options.interactive) {
    await interactiveMode(filter, options.debug);
  } else {
    await checkText(options.text, filter, options.debug);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
