type Level = 'debug' | 'info' | 'success' | 'warn' | 'error';

const PREFIX: Record<Level, string> = {
  debug: '[debug]',
  info: '[info]',
  success: '[ok]',
  warn: '[warn]',
  error: '[error]'
};

class Logger {
  private verbose = false;

  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  debug(message: string) {
    if (this.verbose) {
      console.log(`${PREFIX.debug} ${message}`);
    }
  }

  info(message: string) {
    console.log(`${PREFIX.info} ${message}`);
  }

  success(message: string) {
    console.log(`${PREFIX.success} ${message}`);
  }

  warn(message: string) {
    console.warn(`${PREFIX.warn} ${message}`);
  }

  error(message: string) {
    console.error(`${PREFIX.error} ${message}`);
  }
}

export const logger = new Logger();

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
