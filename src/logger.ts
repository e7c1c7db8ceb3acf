import chalk from "chalk";

type Level = "info" | "warn" | "error";

const tags: Record<Level, string> = {
  info: chalk.cyan("INFO"),
  warn: chalk.yellow("WARN"),
  error: chalk.red("ERROR")
};

function write(level: Level, message: string, extra: unknown[]) {
  const time = chalk.gray(new Date().toISOString());
  const sink =
    level === "error"
      ? console.error
      : level === "warn"
        ? console.warn
        : console.log;
  sink(`${time} ${tags[level]} ${message}`, ...extra);
}

export const log = {
  info: (message: string, ...extra: unknown[]) =>
    write("info", message, extra),
  warn: (message: string, ...extra: unknown[]) =>
    write("warn", message, extra),
  error: (message: string, ...extra: unknown[]) =>
    write("error", message, extra)
};
