import chalk from 'chalk';
import dayjs from 'dayjs';

function timestamp(): string {
  // Local time in a readable format
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

// Shape of WebapiError from spotify-web-api-node and of our SpotifyRequestError
interface HttpErrorFields {
  statusCode?: unknown;
  body?: unknown;
  headers?: unknown;
}

function httpFields(err: Error): HttpErrorFields {
  return {
    statusCode: 'statusCode' in err ? err.statusCode : undefined,
    body: 'body' in err ? err.body : undefined,
    headers: 'headers' in err ? err.headers : undefined,
  };
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
}

export function isDebugEnabled(): boolean {
  // LOG_LEVEL=debug or a truthy DEBUG
  const ll = (process.env.LOG_LEVEL || '').toLowerCase();
  const dbg = (process.env.DEBUG || '').toLowerCase();
  return ll === 'debug' || dbg === '1' || dbg === 'true' || dbg === 'yes' || dbg === 'on';
}

export class Logger {
  static info(message: string): void {
    console.log(`${timestamp()} ${chalk.blueBright('[INFO]')} ${message}`);
  }

  static warn(message: string): void {
    console.warn(`${timestamp()} ${chalk.yellow('[WARN]')} ${message}`);
  }

  static error(message: string, err?: unknown): void {
    let detail = '';
    if (err instanceof Error) {
      detail = `\n${err.name}: ${err.message}`;

      const http = httpFields(err);
      if (typeof http.statusCode === 'number') {
        detail += `\nHTTP Status: ${http.statusCode}`;
      }
      if (http.body !== undefined && http.body !== null) {
        detail += `\nResponse Body: ${stringify(http.body)}`;
      }
      if (http.headers && isDebugEnabled()) {
        detail += `\nResponse Headers: ${stringify(http.headers)}`;
      }

      if (err.stack && isDebugEnabled()) {
        detail += `\n${err.stack}`;
      }
    } else if (err !== undefined) {
      detail = `\n${stringify(err)}`;
    }
    console.error(`${timestamp()} ${chalk.red('[ERROR]')} ${message}${detail}`);
  }

  static debug(message: string): void {
    if (!isDebugEnabled()) return;
    // Print debug without the noisy [DEBUG] label
    console.debug(`${timestamp()} ${message}`);
  }
}
