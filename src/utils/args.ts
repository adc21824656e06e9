import type { Config } from './config.js';

export type ParsedArgs =
  | { ok: true; config: Config; help: boolean }
  | { ok: false; error: string };

export const USAGE = `Usage: colwrap [options]

Options:
  --width <n>          Maximum column (default: 80)
  --delimiter <s>      Line-comment marker (default: //)
  --tab-width <n>      Tab stop interval (default: 8)
  --no-auto-wrap       Start with wrap-on-space disabled
  -h, --help           Show this help`;

function parsePositiveInt(flag: string, value: string | undefined): number | string {
  if (value === undefined) return `${flag} requires a value`;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) return `${flag} must be a positive integer, got "${value}"`;
  return n;
}

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const config: Config = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    const takeValue = (): string | undefined => (eq !== -1 && flag !== arg ? arg.slice(eq + 1) : argv[++i]);

    switch (flag) {
      case '-h':
      case '--help':
        help = true;
        break;
      case '--no-auto-wrap':
        config.autoWrap = false;
        break;
      case '--width':
      case '--tab-width': {
        const parsed = parsePositiveInt(flag, takeValue());
        if (typeof parsed === 'string') return { ok: false, error: parsed };
        if (flag === '--width') {
          config.width = parsed;
        } else {
          config.tabWidth = parsed;
        }
        break;
      }
      case '--delimiter': {
        const value = takeValue();
        if (!value) return { ok: false, error: '--delimiter requires a non-empty value' };
        config.delimiter = value;
        break;
      }
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, config, help };
}
