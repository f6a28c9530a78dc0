/**
 * Server configuration, read from command-line arguments with environment
 * fallbacks: --port= / LABEL_SCAN_PORT and --root= / LABEL_SCAN_ROOT.
 */

export interface ServerConfig {
  /** Port to listen on (default: 3000) */
  port: number;
  /** Directory to scan for markers (default: cwd) */
  rootDir: string;
}

export interface ConfigResult {
  config: ServerConfig;
  /** Problems found while reading configuration; defaults were used instead */
  warnings: string[];
}

export const DEFAULT_PORT = 3000;

function readArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = argv.find(a => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

export function loadServerConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConfigResult {
  const warnings: string[] = [];

  const portValue = readArg(argv, 'port') ?? env.LABEL_SCAN_PORT;
  let port = DEFAULT_PORT;
  if (portValue !== undefined) {
    const n = parseInt(portValue, 10);
    if (!isNaN(n) && n >= 0 && n <= 65535 && String(n) === portValue.trim()) {
      port = n;
    } else {
      warnings.push(`Invalid port "${portValue}", using ${DEFAULT_PORT}`);
    }
  }

  const rootDir = readArg(argv, 'root') ?? env.LABEL_SCAN_ROOT ?? cwd;

  return { config: { port, rootDir }, warnings };
}
