import chalk from 'chalk';
import type { ToolCallResult } from './rpcClient.js';

export type Writer = (line: string) => void;

export class ScenarioPrinter {
  constructor(private readonly write: Writer = line => console.log(line)) {}

  banner(title: string): void {
    const rule = chalk.magenta.bold('='.repeat(80));
    this.write('');
    this.write(rule);
    this.write(chalk.magenta.bold(`🚀 ${title}`));
    this.write(rule);
    this.write('');
  }

  step(message: string, emoji: string, color: (text: string) => string = chalk.cyan): void {
    this.write(color(`${emoji} ${message}`));
  }

  result<T>(emoji: string, label: string, result: ToolCallResult<T>): void {
    const prefix = `${emoji} ${chalk.bold(label)}`;
    switch (result.kind) {
    case 'ok':
      this.write(`${prefix}: ${chalk.green('✅')}`);
      this.write(JSON.stringify(result.value, null, 2));
      break;
    case 'error':
      this.write(`${prefix}: ${chalk.red('❌')} ${chalk.red(`[${result.type}] ${result.message}`)}`);
      break;
    case 'timeout':
      this.write(`${prefix}: ${chalk.red('⏳')} ${chalk.red(`abandoned after ${result.timeoutMs}ms`)}`);
      break;
    }
  }
}
