/**
 * Command-line flags of `pointrec`
 */

import { ReconError, type ReconScope } from '@pointrec/recon-core';

export type MatchBy = 'GenericPointAddress' | 'eTerraAlias';

export interface CliOptions {
  configPath: string;
  scope: ReconScope;
  dataDir?: string;
  useCache: boolean;
  refreshCache: boolean;
  allowDuplicateAddresses: boolean;
  previousReport?: string;
  matchBy: MatchBy;
  help: boolean;
}

export const USAGE = `Usage: pointrec [options]

Options:
  --config <path>                 Config file (default: ./config.json)
  --rtu <name>                    Report on one RTU
  --substation <name>             Report on one substation
  --data-dir <path>               Directory the source files are read from
  --no-cache                      Do not read or write the merged-view cache
  --refresh-cache                 Rebuild the merged view and rewrite the cache
  --allow-duplicate-addresses     Keep the last inventory row per address
  --previous-report <path>        Carry review columns over from an earlier report
  --match-by <column>             GenericPointAddress (default) or eTerraAlias
  --help                          Show this help`;

const VALUE_FLAGS = new Set(['--config', '--rtu', '--substation', '--data-dir', '--previous-report', '--match-by']);

function invalid(message: string): ReconError {
  return new ReconError({
    code: 'INVALID_OPTIONS',
    message,
    suggestion: 'Run with --help to list the options.',
  });
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;

    if (VALUE_FLAGS.has(flag)) {
      let value: string | undefined;
      if (flag !== arg) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || value === '' || value.startsWith('--')) {
        throw invalid(`${flag} needs a value`);
      }
      if (values.has(flag)) throw invalid(`${flag} given more than once`);
      values.set(flag, value);
      continue;
    }

    switch (flag) {
      case '--no-cache':
      case '--refresh-cache':
      case '--allow-duplicate-addresses':
      case '--help':
      case '-h':
        switches.add(flag === '-h' ? '--help' : flag);
        break;
      default:
        throw invalid(`Unknown option: ${arg}`);
    }
  }

  const rtu = values.get('--rtu');
  const substation = values.get('--substation');
  if (rtu !== undefined && substation !== undefined) {
    throw invalid('--rtu and --substation cannot be combined');
  }
  if (switches.has('--no-cache') && switches.has('--refresh-cache')) {
    throw invalid('--no-cache and --refresh-cache cannot be combined');
  }

  const matchBy = values.get('--match-by') ?? 'GenericPointAddress';
  if (matchBy !== 'GenericPointAddress' && matchBy !== 'eTerraAlias') {
    throw invalid(`--match-by must be GenericPointAddress or eTerraAlias, got "${matchBy}"`);
  }

  let scope: ReconScope = { kind: 'all' };
  if (rtu !== undefined) scope = { kind: 'rtu', name: rtu };
  if (substation !== undefined) scope = { kind: 'substation', name: substation };

  return {
    configPath: values.get('--config') ?? 'config.json',
    scope,
    dataDir: values.get('--data-dir'),
    useCache: !switches.has('--no-cache'),
    refreshCache: switches.has('--refresh-cache'),
    allowDuplicateAddresses: switches.has('--allow-duplicate-addresses'),
    previousReport: values.get('--previous-report'),
    matchBy,
    help: switches.has('--help'),
  };
}
