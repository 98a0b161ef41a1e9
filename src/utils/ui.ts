import chalk from "chalk";
import ora, { type Ora } from "ora";

export type RowTone = "pass" | "fail" | "plain";

export const ui = {
  success: (msg: string) => console.log(chalk.green("✔ ") + msg),
  error: (msg: string) => console.error(chalk.red("✖ ") + msg),
  warn: (msg: string) => console.log(chalk.yellow("⚠ ") + msg),
  info: (msg: string) => console.log(chalk.blue("ℹ ") + msg),
  skip: (msg: string) => console.log(chalk.gray("○ ") + msg),
  dim: (msg: string) => console.log(chalk.dim(msg)),
  heading: (msg: string) => console.log(chalk.bold.underline(msg)),
  step: (msg: string) => console.log(chalk.cyan("  → ") + msg),

  spinner(text: string): Ora {
    return ora({ text, color: "cyan" });
  },

  /** Column-aligned rows; the first row is the header. */
  table(rows: string[][], tones: RowTone[] = []) {
    if (rows.length === 0) return;
    const colWidths = rows[0].map((_, col) =>
      Math.max(...rows.map((row) => (row[col] ?? "").length))
    );
    rows.forEach((row, index) => {
      const line = row.map((cell, i) => cell.padEnd(colWidths[i])).join("  ");
      if (index === 0) {
        console.log("  " + chalk.bold(line));
        return;
      }
      const tone = tones[index - 1] ?? "plain";
      const painted =
        tone === "pass" ? chalk.green(line) : tone === "fail" ? chalk.red(line) : line;
      console.log("  " + painted);
    });
  },
};
