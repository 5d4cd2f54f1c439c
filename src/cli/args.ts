export type Subcommand = 'run' | 'resume' | 'graph';

export interface CliArgs {
  command: Subcommand;
  file: string;
  dryRun?: boolean;
  stateDir?: string;
}

export const USAGE = [
  'Usage:',
  '  plan-runner run [--dryrun] [--state-dir DIR] plan.yaml',
  '  plan-runner resume [--dryrun] [--state-dir DIR] state.yaml',
  '  plan-runner graph plan-or-state.yaml',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = 'UsageError';
  }
}

const SUBCOMMANDS: readonly Subcommand[] = ['run', 'resume', 'graph'];

function isSubcommand(s: string | undefined): s is Subcommand {
  return s !== undefined && (SUBCOMMANDS as readonly string[]).includes(s);
}

/** Parse argv without the node binary and script path. */
export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!isSubcommand(command)) throw new UsageError(command ? `Unknown command '${command}'.` : 'No command given.');

  const out: Partial<CliArgs> & { command: Subcommand } = { command };
  const positional: string[] = [];
  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    if ((a === '--dryrun' || a === '--dry-run') && command !== 'graph') out.dryRun = true;
    else if (a.startsWith('--state-dir=') && command !== 'graph') out.stateDir = a.slice('--state-dir='.length);
    else if (a === '--state-dir' && command !== 'graph') {
      const next = rest[++i];
      if (next === undefined) throw new UsageError('--state-dir needs a directory.');
      out.stateDir = next;
    }
    else if (a.startsWith('-')) throw new UsageError(`Unknown option '${a}' for ${command}.`);
    else positional.push(a);
  }
  if (positional.length !== 1) throw new UsageError(`${command} takes exactly one file.`);
  return { ...out, file: positional[0] };
}
