import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { ScenarioPrinter } from '../src/client/printer.js';

beforeAll(() => {
  chalk.level = 0;
});

function capture() {
  const lines: string[] = [];
  return { lines, printer: new ScenarioPrinter((line) => lines.push(line)) };
}

describe('ScenarioPrinter', () => {
  it('prints ok results as indented JSON', () => {
    const { lines, printer } = capture();
    printer.result('💰', 'Final balance', { kind: 'ok', value: { balanceMinorUnits: 7_500 } });
    expect(lines).toEqual(['💰 Final balance: ✅', '{\n  "balanceMinorUnits": 7500\n}']);
  });

  it('prints errors with their type', () => {
    const { lines, printer } = capture();
    printer.result('🧾', 'Retry', { kind: 'error', type: 'INSUFFICIENT_FUNDS', message: 'no', status: 422 });
    expect(lines).toEqual(['🧾 Retry: ❌ [INSUFFICIENT_FUNDS] no']);
  });

  it('prints abandoned calls', () => {
    const { lines, printer } = capture();
    printer.result('🧾', 'First', { kind: 'timeout', timeoutMs: 2_000 });
    printer.step('Retrying...', '🔁');
    expect(lines).toEqual(['🧾 First: ⏳ abandoned after 2000ms', '🔁 Retrying...']);
  });
});
