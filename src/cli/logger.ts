import chalk from "chalk";

/**
 * Terminal logging. Everything goes to stderr: stdout carries the script.
 */
export class Logger {
  constructor(
    private readonly write: (line: string) => void = (line) =>
      console.error(line),
  ) {}

  info(message: string): void {
    this.print(chalk.bgBlue.black(" INFO "), chalk.cyan(message));
  }

  success(message: string): void {
    this.print(chalk.bgGreen.black(" OK "), chalk.greenBright(message));
  }

  warn(message: string): void {
    this.print(chalk.bgYellow.black(" WARN "), chalk.yellowBright(message));
  }

  error(message: string): void {
    this.print(chalk.bgRed.white(" ERROR "), chalk.redBright(message));
  }

  private print(label: string, content: string): void {
    const ts = chalk.gray(`[${new Date().toISOString()}]`);
    this.write(`${ts} ${label} ${content}`);
  }
}
