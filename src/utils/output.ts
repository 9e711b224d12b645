/**
 * CLI output
 *
 * Results go to stdout, diagnostics to stderr. With --json every result is a
 * JSON document and every error a one-line JSON object.
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let current: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  current = { ...current, ...options };
}

export function isJsonOutput(): boolean {
  return current.json === true;
}

/** Print `data` as JSON, or `text` */
export function output(data: unknown, text: string): void {
  console.log(current.json ? JSON.stringify(data, null, 2) : text);
}

export function outputSuccess(message: string, data?: unknown): void {
  if (current.json) {
    console.log(JSON.stringify(data === undefined ? { success: true, message } : { success: true, message, data }));
  } else {
    console.log(`✓ ${message}`);
  }
}

export function outputError(message: string, error?: unknown): void {
  const cause = error instanceof Error ? error : undefined;
  const detail = cause ? cause.message : error === undefined ? undefined : String(error);

  if (current.json) {
    console.error(JSON.stringify({ error: message, type: cause?.name, details: detail }));
    return;
  }

  console.error(`Error: ${message}`);
  if (detail !== undefined) {
    console.error(`  ${detail}`);
  }
  if (current.verbose && cause?.stack) {
    console.error(cause.stack);
  }
}

/** Report a failed command and exit with status 1 */
export function fail(message: string, error?: unknown): never {
  outputError(message, error);
  process.exit(1);
}
