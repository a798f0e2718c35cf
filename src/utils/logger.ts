import chalk from "chalk";

export class Logger {
  private readonly verbose: boolean;
  private readonly scope?: string;

  constructor(verbose: boolean, scope?: string) {
    this.verbose = verbose;
    this.scope = scope;
  }

  child(scope: string): Logger {
    return new Logger(this.verbose, this.scope ? `${this.scope}:${scope}` : scope);
  }

  info(message: string): void {
    console.log(chalk.cyan(this.format("INFO", message)));
  }

  success(message: string): void {
    console.log(chalk.green(this.format("OK", message)));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(this.format("WARN", message)));
  }

  error(message: string): void {
    console.error(chalk.red(this.format("ERROR", message)));
  }

  verboseLog(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(this.format("VERBOSE", message)));
    }
  }

  private format(level: string, message: string): string {
    return this.scope ? `[${level}] [${this.scope}] ${message}` : `[${level}] ${message}`;
  }
}
