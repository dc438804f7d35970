export interface CliOptions {
  hours?: number;
  limit: number;
  category?: string;
  account?: string;
  days?: number;
  force: boolean;
  refresh: boolean;
  json: boolean;
  confirm: boolean;
}

function readNumber(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${flag} expects a positive number, got "${raw ?? ''}"`);
  }
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { limit: 10, force: false, refresh: false, json: false, confirm: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--hours':
        options.hours = readNumber(arg, args[++i]);
        break;
      case '--limit':
        options.limit = Math.floor(readNumber(arg, args[++i]));
        break;
      case '--days':
        options.days = readNumber(arg, args[++i]);
        break;
      case '--category':
        options.category = args[++i];
        break;
      case '--account':
        options.account = args[++i];
        break;
      case '--force':
        options.force = true;
        break;
      case '--refresh':
        options.refresh = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--confirm':
        options.confirm = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }
  return options;
}
