import chalk from "chalk";
import type { Verdict } from "@qa-campaign/shared";

export function banner(): void {
  console.log(
    chalk.bold.cyan(`
  ╔═╗╔═╗   ╔═╗╔═╗╔╦╗╔═╗╔═╗╦╔═╗╔╗╔
  ║═╬╣═╣───║  ╠═╣║║║╠═╝╠═╣║║ ╦║║║
  ╚═╝╩ ╩   ╚═╝╩ ╩╩ ╩╩  ╩ ╩╩╚═╝╝╚╝
`),
  );
  console.log(chalk.dim("  Plan, rank, execute and analyze web test campaigns | 'help' for usage\n"));
}

export function info(msg: string): void {
  console.log(chalk.blue(`[info] ${msg}`));
}

export function success(msg: string): void {
  console.log(chalk.green(`[ok] ${msg}`));
}

export function warn(msg: string): void {
  console.log(chalk.yellow(`[warn] ${msg}`));
}

export function error(msg: string): void {
  console.log(chalk.red(`[error] ${msg}`));
}

export function phase(stage: string, percent: number, message: string): void {
  const pct = `${percent}%`.padStart(4);
  const color = stage === "Failed" ? chalk.red : stage === "Complete" ? chalk.green : chalk.cyan;
  console.log(`${color(`[${pct}] ${stage}`)} ${chalk.dim(message)}`);
}

export function verdict(value: Verdict | null): void {
  const colors: Record<Verdict, (s: string) => string> = {
    EXCELLENT: chalk.green.bold,
    GOOD: chalk.green,
    FAIR: chalk.yellow.bold,
    POOR: chalk.red.bold,
  };
  const colorFn = value ? colors[value] : chalk.dim;
  console.log(colorFn(`\n  VERDICT: ${value ?? "N/A"}`));
}

export function separator(): void {
  console.log(chalk.dim("─".repeat(60)));
}
