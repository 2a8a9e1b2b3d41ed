import chalk from "chalk";

/** Header names whose values never reach the log */
const SECRET_HEADERS = new Set(["x-api-key", "authorization"]);

/** Logger configuration */
interface LoggerConfig {
  debugEnabled: boolean;
}

class Logger {
  private config: LoggerConfig = {
    debugEnabled: false,
  };

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.config.debugEnabled = enabled;
  }

  debug(message: string): void {
    if (this.config.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    console.log(chalk.blue(`[INFO] ${message}`));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`[WARN] ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`[ERROR] ${message}`));
  }

  success(message: string): void {
    console.log(chalk.green(`[SUCCESS] ${message}`));
  }

  /**
   * Log a curl command for an API request (debug only).
   * API keys are masked.
   */
  logCurl(
    method: string,
    url: string,
    headers?: Record<string, string>,
    body?: unknown
  ): void {
    if (!this.config.debugEnabled) return;

    let curl = `curl -X ${method} '${url}'`;

    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        const shown = SECRET_HEADERS.has(key.toLowerCase()) ? "***" : value;
        curl += ` \\\n  -H '${key}: ${shown}'`;
      }
    }

    if (body !== undefined) {
      const bodyStr = typeof body === "string" ? body : JSON.stringify(body);
      curl += ` \\\n  -d '${bodyStr}'`;
    }

    this.debug(`API Call:\n${curl}`);
  }
}

/** Global logger instance */
export const logger = new Logger();
