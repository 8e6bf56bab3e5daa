#!/usr/bin/env node

/**
 * Naming Assistant CLI
 *
 * Asks naming questions, looks up or proposes abbreviations, analyzes source files, or starts the MCP server.
 */

import * as fs from 'fs';
import * as path from 'path';
import packageJson from '../package.json';
import { loadConfig } from './core/config';
import type { AbbreviationResult } from './pipeline/abbreviationAdvisor';
import { createNamingPipeline } from './pipeline/factory';
import { formatContextReport, toResponsePayload } from './pipeline/orchestrator';
import type { ResultRecord } from './pipeline/types';
import { getUserFriendlyMessage, handleError, toErrorMessage } from './utils/errorHandler';
import { SUPPORTED_EXTENSIONS } from './utils/languageUtils';
import { logger } from './utils/logger';

export type OutputFormat = 'text' | 'json';

export interface CliOptions {
  format: OutputFormat;
  showContext: boolean;
  /** Classify ask requests first and answer abbreviation requests through the dictionary path. */
  route: boolean;
  request?: string;
  help: boolean;
  version: boolean;
}

export type CliCommand =
  | { kind: 'ask'; text: string }
  | { kind: 'analyze'; filePath: string }
  | { kind: 'abbreviate'; term: string }
  | { kind: 'server' }
  | { kind: 'help' }
  | { kind: 'version' };

export interface ParsedCli {
  command: CliCommand;
  options: CliOptions;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(args: string[]): ParsedCli {
  const options: CliOptions = { format: 'text', showContext: false, route: false, help: false, version: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--format') {
      const value = args[++i];
      if (value !== 'text' && value !== 'json') {
        throw new CliUsageError(`--format expects "text" or "json", got "${value ?? ''}"`);
      }
      options.format = value;
    } else if (arg === '--request') {
      const value = args[++i];
      if (value === undefined) {
        throw new CliUsageError('--request expects a value');
      }
      options.request = value;
    } else if (arg === '--show-context') {
      options.showContext = true;
    } else if (arg === '--route') {
      options.route = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-V') {
      options.version = true;
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (options.help) return { command: { kind: 'help' }, options };
  if (options.version) return { command: { kind: 'version' }, options };

  const [name, ...rest] = positional;
  switch (name) {
    case undefined:
    case 'help':
      return { command: { kind: 'help' }, options };
    case 'server':
      return { command: { kind: 'server' }, options };
    case 'ask': {
      const text = rest.join(' ').trim();
      if (!text) {
        throw new CliUsageError('ask expects a question, e.g. naming-assistant ask "Java class name for order history"');
      }
      return { command: { kind: 'ask', text }, options };
    }
    case 'analyze': {
      if (rest.length !== 1) {
        throw new CliUsageError('analyze expects exactly one file path');
      }
      return { command: { kind: 'analyze', filePath: rest[0] }, options };
    }
    case 'abbreviate': {
      const term = rest.join(' ').trim();
      if (!term) {
        throw new CliUsageError('abbreviate expects a term, e.g. naming-assistant abbreviate "주문이력"');
      }
      return { command: { kind: 'abbreviate', term }, options };
    }
    default:
      throw new CliUsageError(`Unknown command: ${name}`);
  }
}

export function formatCliOutput(record: ResultRecord, options: CliOptions): string {
  if (options.format === 'json') {
    return JSON.stringify(
      {
        ...toResponsePayload(record),
        ...(options.showContext ? { context_report: formatContextReport(record) } : {}),
      },
      null,
      2
    );
  }

  const lines = [
    record.answer,
    '',
    `Search query: ${record.metadata.query}`,
    `Retrieved contexts: ${record.metadata.contextCount}`,
  ];
  if (options.showContext) {
    lines.push('', formatContextReport(record));
  }
  return lines.join('\n');
}

export function formatAbbreviationOutput(result: AbbreviationResult, options: CliOptions): string {
  if (options.format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  const lines = [result.answer, '', `Source: ${result.source}`];
  if (options.showContext && result.relatedEntries.length > 0) {
    lines.push('', 'Related dictionary entries:', ...result.relatedEntries.map(entry => `- ${entry}`));
  }
  return lines.join('\n');
}

function showHelp(): void {
  console.log('🤖 Naming Assistant');
  console.log('===================');
  console.log('');
  console.log('Naming convention answers grounded in your rules, term dictionary and Q&A indexes');
  console.log('');
  console.log('Usage:');
  console.log('  naming-assistant ask "<question>"          Ask a naming question');
  console.log('  naming-assistant analyze <file>            Review identifiers in a source file');
  console.log('  naming-assistant abbreviate "<term>"       Look up or propose a term abbreviation');
  console.log('  naming-assistant server                    Start the MCP server over stdio');
  console.log('');
  console.log('Options:');
  console.log('  --format text|json     Output format (default: text)');
  console.log('  --show-context         Print the retrieved context per collection');
  console.log('  --request "<text>"     Extra note for analyze');
  console.log('  --route                Send abbreviation requests made through ask to abbreviate');
  console.log('  --help, -h             Show this help');
  console.log('  --version, -V          Show the version');
  console.log('');
  console.log(`Supported file types: ${SUPPORTED_EXTENSIONS.join(', ')}`);
  console.log('');
  console.log('Required environment:');
  console.log('  SEARCH_ENDPOINT, SEARCH_API_KEY, OPENAI_API_KEY');
  console.log('  AZURE_OPENAI_ENDPOINT when OPENAI_PROVIDER=azure');
}

async function runRequest(
  command: Extract<CliCommand, { kind: 'ask' | 'analyze' | 'abbreviate' }>,
  options: CliOptions
): Promise<number> {
  try {
    const config = loadConfig();
    logger.configure(config.logging);
    const { orchestrator, advisor } = createNamingPipeline(config);

    if (command.kind === 'abbreviate') {
      console.log(formatAbbreviationOutput(await advisor.abbreviate(command.term), options));
      return 0;
    }
    if (command.kind === 'ask' && options.route && (await advisor.classifyIntent(command.text)) === 'abbreviation') {
      console.log(formatAbbreviationOutput(await advisor.abbreviate(command.text), options));
      return 0;
    }

    const record =
      command.kind === 'ask'
        ? await orchestrator.run({ text: command.text })
        : await orchestrator.run({
            text: options.request,
            file: {
              name: path.basename(command.filePath),
              bytes: await fs.promises.readFile(command.filePath),
            },
          });

    console.log(formatCliOutput(record, options));
    return 0;
  } catch (error) {
    const structured = handleError(error, { command: command.kind }, 'warn');
    console.error(`❌ ${getUserFriendlyMessage(structured)}`);
    return 1;
  }
}

async function main(argv: string[]): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(toErrorMessage(error));
    console.error('Use --help for usage information.');
    return 2;
  }

  const { command, options } = parsed;
  switch (command.kind) {
    case 'help':
      showHelp();
      return 0;
    case 'version':
      console.log(packageJson.version);
      return 0;
    case 'server': {
      // Imported lazily so ask/analyze do not load the MCP SDK
      const { startServer } = await import('./index');
      await startServer();
      return -1;
    }
    case 'ask':
    case 'analyze':
    case 'abbreviate':
      return runRequest(command, options);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      // The server keeps running on stdio
      if (code >= 0) process.exit(code);
    })
    .catch(error => {
      console.error('CLI Error:', toErrorMessage(error));
      process.exit(1);
    });
}
