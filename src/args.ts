import path from 'node:path';
import type { BackendName } from './types.js';
import { ensureDownloadsDir, isHttpUrl } from './utils.js';

const BACKENDS: readonly BackendName[] = ['google-drive', 'yandex-disk', 'local'];

export interface CliConfig {
  readonly urls: string[];
  readonly urlsFile?: string;
  readonly backend: BackendName;
  readonly folder: string;
  /** True when `folder` was filled in because no `--folder` was given. */
  readonly folderIsDefault: boolean;
  readonly quality: string;
  readonly template?: string;
  readonly proxy?: string;
  readonly checkOnly: boolean;
  readonly help: boolean;
}

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

const isBackendName = (value: string): value is BackendName =>
  BACKENDS.some((backend) => backend === value);

/**
 * Parses CLI arguments into the effective run configuration. `--name=value`
 * and `--name value` are both accepted.
 */
export const parseArgs = (argv: readonly string[], defaults: { proxy?: string } = {}): CliConfig => {
  const urls: string[] = [];
  let urlsFile: string | undefined;
  let backend: BackendName = 'local';
  let folder: string | undefined;
  let quality = 'best';
  let template: string | undefined;
  let proxy = defaults.proxy;
  let checkOnly = false;
  let help = false;

  const args = argv.flatMap((arg) => {
    if (!arg.startsWith('--') || !arg.includes('=')) return [arg];
    const eq = arg.indexOf('=');
    return [arg.slice(0, eq), arg.slice(eq + 1)];
  });

  const takeValue = (index: number, flag: string): string => {
    const next = args[index + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new ArgumentError(`${flag} expects a value`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--check':
        checkOnly = true;
        break;
      case '--url':
      case '-u':
        urls.push(takeValue(i, arg));
        i += 1;
        break;
      case '--file':
      case '-f':
        urlsFile = path.resolve(process.cwd(), takeValue(i, arg));
        i += 1;
        break;
      case '--backend':
      case '-b': {
        const value = takeValue(i, arg);
        if (!isBackendName(value)) {
          throw new ArgumentError(`Unknown backend '${value}'. Expected one of: ${BACKENDS.join(', ')}`);
        }
        backend = value;
        i += 1;
        break;
      }
      case '--folder':
      case '-o':
        folder = takeValue(i, arg);
        i += 1;
        break;
      case '--quality':
      case '-q':
        quality = takeValue(i, arg);
        i += 1;
        break;
      case '--template':
      case '-t':
        template = takeValue(i, arg);
        i += 1;
        break;
      case '--proxy':
        proxy = takeValue(i, arg);
        i += 1;
        break;
      default:
        if (isHttpUrl(arg)) {
          urls.push(arg);
          break;
        }
        throw new ArgumentError(`Unrecognised argument: ${arg}`);
    }
  }

  return {
    urls,
    urlsFile,
    backend,
    folder: folder ?? (backend === 'local' ? path.resolve(process.cwd(), 'downloads') : ''),
    folderIsDefault: folder === undefined,
    quality,
    template,
    proxy,
    checkOnly,
    help,
  };
};

/**
 * Creates the default ./downloads folder of a local run. A folder named on the
 * command line is left alone so pre-flight can reject it when it is missing.
 */
export const prepareDefaultFolder = async (cli: CliConfig): Promise<void> => {
  if (cli.backend === 'local' && cli.folderIsDefault) {
    await ensureDownloadsDir(cli.folder);
  }
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (): void => {
  const lines = [
    'Video download & upload',
    '',
    'Usage:',
    '  vdu <URL> [<URL> ...] [options]',
    '  vdu --file urls.txt --backend google-drive --folder Videos/2024',
    '',
    'Options:',
    '  -u, --url <url>          Video URL (repeatable; bare URLs work too)',
    '  -f, --file <path>        File with one URL per line (# starts a comment)',
    '  -b, --backend <name>     google-drive | yandex-disk | local (default local)',
    '  -o, --folder <path>      Destination folder (default ./downloads for local)',
    '  -q, --quality <preset>   best | 1080p | 720p | 480p | audio, or a raw yt-dlp format',
    '  -t, --template <tpl>     yt-dlp output template (default %(title)s.%(ext)s)',
    '      --proxy <url>        Proxy for downloads (default PROXY_URL)',
    '      --check              Run the pre-flight checks only',
    '  -h, --help               Show this help message',
    '',
    'Press Ctrl+C once to cancel a run, twice to exit immediately.',
  ];
  console.log(lines.join('\n'));
};
