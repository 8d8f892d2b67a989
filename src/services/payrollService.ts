import { DataSource, EntityManager } from 'typeorm';
import { Payroll } from '../entities/Payroll';
import { PayrollItem } from '../entities/PayrollItem';
import { logger as rootLogger, type Logger } from '../logger';
import type { PayrollLine, PayrollPreview, PayrollRun, PayrollRunSummary } from '../types';
import { employeeRepository } from './employeeRepository';
import { calculate, flatRateDeduction, type DeductionPolicy } from './payrollCalculator';

// 6 bound parameters per row keeps each statement well under the
// postgres limit of 65535
export const ITEM_INSERT_CHUNK = 1000;

export type PayrollServiceOptions = {
  policy?: DeductionPolicy;
  logger?: Logger;
  itemChunkSize?: number;
};

function toSummary(run: Payroll): PayrollRunSummary {
  return {
    id: run.id,
    month: run.month,
    year: run.year,
    totalCost: run.totalCost,
    approvedAt: run.approvedAt,
  };
}

function toLine(item: PayrollItem): PayrollLine {
  return {
    employeeId: item.employeeId,
    name: item.employeeName,
    gross: item.gross,
    deductions: item.deductions,
    net: item.net,
  };
}

export function payrollService(dataSource: DataSource, options: PayrollServiceOptions = {}) {
  const policy = options.policy ?? flatRateDeduction();
  const chunkSize = options.itemChunkSize ?? ITEM_INSERT_CHUNK;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`itemChunkSize must be a positive integer, got ${chunkSize}`);
  }
  const log = (options.logger ?? rootLogger).child({ component: 'payroll' });

  async function computePreview(manager: EntityManager, month: number, year: number): Promise<PayrollPreview> {
    const active = await employeeRepository(manager).listActiveEmployees();
    const items = active.map((e) => calculate(e, policy));
    const totalCost = items.reduce((sum, item) => sum + item.net, 0);
    return { month, year, totalCost, items };
  }

  return {
    /** Computes payroll for every active employee. Nothing is written. */
    previewPayroll(month: number, year: number): Promise<PayrollPreview> {
      return computePreview(dataSource.manager, month, year);
    },

    /**
     * Recomputes the preview and stores it as a new run with its line items
     * in one transaction. Approving a period twice yields two runs.
     */
    async approvePayroll(month: number, year: number): Promise<number> {
      const { runId, itemCount } = await dataSource.transaction(async (tx) => {
        const preview = await computePreview(tx, month, year);
        const run = await tx.save(tx.create(Payroll, { month, year, totalCost: preview.totalCost }));
        const rows = preview.items.map((item) => ({
          payrollId: run.id,
          employeeId: item.employeeId,
          employeeName: item.name,
          gross: item.gross,
          deductions: item.deductions,
          net: item.net,
        }));
        for (let start = 0; start < rows.length; start += chunkSize) {
          await tx.insert(PayrollItem, rows.slice(start, start + chunkSize));
        }
        return { runId: run.id, itemCount: preview.items.length };
      });
      log.info({ payrollId: runId, month, year, items: itemCount }, 'payroll approved');
      return runId;
    },

    async listPayrollRuns(): Promise<PayrollRunSummary[]> {
      const runs = await dataSource.manager.find(Payroll, {
        order: { year: 'DESC', month: 'DESC', id: 'ASC' },
      });
      return runs.map(toSummary);
    },

    async getPayrollRun(id: number): Promise<PayrollRun | null> {
      const run = await dataSource.manager.findOneBy(Payroll, { id });
      if (!run) return null;
      const items = await dataSource.manager.find(PayrollItem, {
        where: { payrollId: id },
        order: { id: 'ASC' },
      });
      return { ...toSummary(run), items: items.map(toLine) };
    },
  };
}

export type PayrollService = ReturnType<typeof payrollService>;
