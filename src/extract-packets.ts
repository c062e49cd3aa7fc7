#!/usr/bin/env tsx
/**
 * Protocol Wiki Packet Extractor
 *
 * Reads the protocol documentation page of a wiki revision, reconstructs
 * every packet table and prints the inferred packet schemas.
 */

import { parseArgs } from 'util';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { loadDialect } from './dialect';
import { countPackets } from './diagnostics';
import { WikiExtractError } from './errors';
import { DEFAULT_API_URL, fetchRevision, readRevisionFile } from './revision-source';
import { SchemaPrinter } from './schema-printer';
import { SectionWalker } from './section-walker';
import { splitSections } from './sections';

export interface Args {
  input: string | null;
  revision: number | null;
  apiUrl: string;
  dialect: string | null;
  skipMissingTables: boolean;
  json: boolean;
  help: boolean;
}

function printHelp(): void {
  console.log(`
Protocol Wiki Packet Extractor

Usage: extract-packets [options]

Options:
  --input <path>           Read page markup from a local file
  --revision <id>          Fetch page markup for a wiki revision id
                           (can also use WIKI_REVISION env var)
  --api-url <url>          MediaWiki api.php endpoint
                           (default: ${DEFAULT_API_URL}, or WIKI_API_URL env var)
  --dialect <path>         JSON file overriding section names and table headers
  --skip-missing-tables    Skip packet sections without a table instead of failing
  --json                   Print the extracted packets as JSON
  --help                   Show this help message

Examples:
  extract-packets --input ./protocol.wiki
  extract-packets --revision 3024144 --json
`);
}

export function parseArguments(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Args {
  const { values } = parseArgs({
    args: argv,
    options: {
      'input': {
        type: 'string'
      },
      'revision': {
        type: 'string'
      },
      'api-url': {
        type: 'string'
      },
      'dialect': {
        type: 'string'
      },
      'skip-missing-tables': {
        type: 'boolean',
        default: false
      },
      'json': {
        type: 'boolean',
        default: false
      },
      'help': {
        type: 'boolean',
        default: false
      }
    },
    allowPositionals: false
  });

  // Check for revision in env if not provided as argument
  const revisionText = values['revision'] ?? env.WIKI_REVISION;
  let revision: number | null = null;
  if (revisionText !== undefined) {
    if (!/^\d+$/.test(revisionText) || Number(revisionText) <= 0) {
      throw new WikiExtractError(`Invalid revision id: ${revisionText}`);
    }
    revision = Number(revisionText);
  }

  return {
    input: values['input'] ?? null,
    revision,
    apiUrl: values['api-url'] ?? env.WIKI_API_URL ?? DEFAULT_API_URL,
    dialect: values['dialect'] ?? null,
    skipMissingTables: values['skip-missing-tables'] ?? false,
    json: values['json'] ?? false,
    help: values['help'] ?? false
  };
}

async function loadSource(args: Args): Promise<string> {
  if (args.input !== null) {
    return readRevisionFile(args.input);
  }
  if (args.revision !== null) {
    return fetchRevision(args.revision, { apiUrl: args.apiUrl });
  }
  throw new WikiExtractError('No page source given');
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: Args;
  try {
    args = parseArguments(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  // Validate inputs
  if ((args.input === null) === (args.revision === null)) {
    console.error('Error: Provide exactly one of --input or --revision');
    return 1;
  }

  // Progress goes to stderr when stdout carries JSON
  const log = args.json ? console.error : console.log;

  log('╔════════════════════════════════════════════════════════════╗');
  log('║  Protocol Wiki Packet Extractor                             ║');
  log('╚════════════════════════════════════════════════════════════╝');
  log('');
  if (args.input !== null) {
    log(`📁 Input file: ${args.input}`);
  } else {
    log(`🌐 Revision: ${args.revision} (${args.apiUrl})`);
  }
  log(`📐 Dialect: ${args.dialect ?? 'bundled'}`);
  log('');

  try {
    const dialect = args.dialect !== null ? loadDialect(args.dialect) : loadDialect();

    log('🔍 Loading page source...');
    const source = await loadSource(args);

    const root = splitSections(source);
    log(`   └─ ${root.children.length} top-level sections`);
    log('');

    log('🧩 Parsing packet tables...');
    const walker = new SectionWalker({
      dialect,
      onMissingTable: args.skipMissingTables ? 'skip' : 'throw'
    });
    const result = walker.walk(root);

    // Summary statistics
    const totalPackets = countPackets(result);
    log('');
    log('📊 Parsing complete:');
    log(`   ├─ ${totalPackets} packets in ${result.states.length} states`);
    log(`   └─ ${result.skipped.length} skipped`);
    log('');

    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      const title = args.input !== null ? `Packets from ${args.input}` : `Packets from revision ${args.revision}`;
      console.log(new SchemaPrinter(title).render(result).join('\n'));
    }

    log('✅ Extraction complete!');
    return 0;
  } catch (error) {
    console.error('');
    console.error('❌ Error during extraction:');
    console.error(error instanceof WikiExtractError ? error.message : error);
    return 1;
  }
}

/**
 * Whether the script path names this module, following the symlink npm
 * installs for the `bin` entry
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string = import.meta.url): boolean {
  if (!scriptPath) {
    return false;
  }
  let resolved: string;
  try {
    resolved = realpathSync(scriptPath);
  } catch {
    return false;
  }
  return moduleUrl === pathToFileURL(resolved).href;
}

// Run main and exit with status code
if (isEntryPoint(process.argv[1])) {
  main().then(code => process.exit(code));
}
