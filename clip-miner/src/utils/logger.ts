import chalk from "chalk";

class Logger {
  private debugEnabled = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(chalk.blue(`[INFO] ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
  }

  /**
   * Log a curl command for an API request (debug only).
   * Form bodies are rendered as -F fields, anything else as -d.
   */
  logCurl(
    method: string,
    url: string,
    headers?: Record<string, string>,
    body?: Record<string, string> | string
  ): void {
    if (!this.debugEnabled) return;

    let curl = `curl -X ${method} '${url}'`;

    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        curl += ` \\\n  -H '${key}: ${value}'`;
      }
    }

    if (typeof body === "string") {
      curl += ` \\\n  -d '${body}'`;
    } else if (body) {
      for (const [key, value] of Object.entries(body)) {
        curl += ` \\\n  -F '${key}=${value}'`;
      }
    }

    this.debug(`API Call:\n${curl}`);
  }
}

/** Global logger instance */
export const logger = new Logger();
