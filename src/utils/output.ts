/**
 * Output utilities for CLI
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

/**
 * Report a failure on stderr. `error` may be anything a catch clause receives.
 */
export function outputError(message: string, error?: unknown): void {
  const cause = error === undefined || error instanceof Error ? error : new Error(String(error));
  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      details: cause?.message,
    }));
  } else {
    console.error(`Error: ${message}${cause ? `: ${cause.message}` : ''}`);
    if (cause && globalOptions.verbose) {
      console.error(cause.stack);
    }
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    const result: { success: boolean; message: string; data?: unknown } = {
      success: true,
      message,
    };
    if (data !== undefined) {
      result.data = data;
    }
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${message}`);
  }
}
