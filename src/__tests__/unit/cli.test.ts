import { describe, it, expect, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { runBatch } from '../../cli/commands.js';

const fixturePath = fileURLToPath(new URL('../fixtures/raw-batch.json', import.meta.url));

describe('runBatch', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs a JSON batch end to end and prints the run description first', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const lines: string[] = [];

    const result = await runBatch({ input: fixturePath, stddev: 'population' }, (line) => lines.push(line));

    expect(result.summary).toMatchObject({ rawCount: 5, acceptedCount: 4, rejectedCount: 1, factCount: 4 });
    expect(lines[0]).toBe('Staging Rows: 5 | Fact Rows: 4');

    const report = JSON.parse(lines[1]);
    expect(report.counts).toEqual({ totalRows: 5, cleanRows: 4, rejectedRows: 1, factRows: 4 });
    expect(report.months).toEqual([
      { purchaseMonth: '2024-03', totalSpend: 2000, activeVendors: 1, highRiskOrders: 0, avgDeliveryDays: 7 },
      { purchaseMonth: '2024-04', totalSpend: 2800, activeVendors: 2, highRiskOrders: 2, avgDeliveryDays: 2 },
    ]);
  });
});
