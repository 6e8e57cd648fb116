/**
 * CLI output helpers with colors and formatting.
 */

import chalk from 'chalk';

/**
 * Print the CLI banner.
 */
export function printBanner(): void {
  const rule = '='.repeat(60);
  console.log(chalk.gray(rule));
  console.log(`${chalk.cyan.bold('lms-reports')} ${chalk.gray('LMS reporting API for BI dashboards')}`);
  console.log(chalk.gray(rule));
}

/**
 * Success message.
 */
export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

/**
 * Info message.
 */
export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Print a labelled value.
 */
export function row(label: string, value: string): void {
  console.log(`  ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}

/**
 * Print empty line.
 */
export function newline(): void {
  console.log('');
}
