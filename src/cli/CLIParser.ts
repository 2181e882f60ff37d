import { ServerConfig, DEFAULT_CONFIG, resolveServerConfig } from '../common/Config';
import { ConfigError } from '../common/Errors';

export interface CLIOptions {
  readonly config: ServerConfig;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, help: true };
    }

    const config = resolveServerConfig({
      host: this.getString('--host') ?? DEFAULT_CONFIG.host,
      port: this.getNumber('--port') ?? DEFAULT_CONFIG.port,
      bodyLimit: this.getString('--body-limit') ?? DEFAULT_CONFIG.bodyLimit,
    });

    return { config, help: false };
  }

  private getString(flag: string): string | undefined {
    const prefix = `${flag}=`;
    const inline = this.args.find(arg => arg.startsWith(prefix));
    if (inline !== undefined) {
      return inline.slice(prefix.length);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    if (!/^\d+$/.test(str)) {
      throw new ConfigError(`Invalid number for ${flag}: ${str}`);
    }
    return parseInt(str, 10);
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
JSON KV Server

Usage: node dist/index.js [options]

Options:
  --help, -h              Show this help message
  --host=HOST             Interface to listen on (default: localhost)
  --port=PORT             HTTP port (default: 4000)
  --body-limit=SIZE       Largest accepted request body (default: 10mb)

Endpoints:
  GET  /get?key=KEY       Read a value
  POST /set               Body {"key": KEY, "value": VALUE}
  POST /delete            Body {"key": KEY}

Examples:
  node dist/index.js --port=8080
  node dist/index.js --host 0.0.0.0 --port 4000
`);
  }
}
