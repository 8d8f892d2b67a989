import { DataSource, EntityManager } from 'typeorm';
import pino from 'pino';
import { employeeRepository, type EmployeeRepository } from '../src/services/employeeRepository';
import { payrollService, type PayrollService } from '../src/services/payrollService';
import { flatRateDeduction } from '../src/services/payrollCalculator';
import { createTestDataSource } from './helpers/dataSource';
import { makeEmployee } from './helpers/factories';

describe('payrollService', () => {
  let dataSource: DataSource;
  let employees: EmployeeRepository;
  let payroll: PayrollService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    employees = employeeRepository(dataSource.manager);
    payroll = payrollService(dataSource, { logger: pino({ level: 'silent' }) });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.destroy();
  });

  describe('previewPayroll', () => {
    it('includes only active employees', async () => {
      const a = await employees.createEmployee(makeEmployee({ name: 'A', salary: 1000 }));
      await employees.createEmployee(makeEmployee({ name: 'B', salary: 2000, status: 'on_leave' }));
      await employees.createEmployee(makeEmployee({ name: 'C', salary: 3000, status: 'exited' }));

      const preview = await payroll.previewPayroll(6, 2024);

      expect(preview).toEqual({
        month: 6,
        year: 2024,
        totalCost: 900,
        items: [{ employeeId: a, name: 'A', gross: 1000, deductions: 100, net: 900 }],
      });
    });

    it('sums net pay across employees in id order', async () => {
      const a = await employees.createEmployee(makeEmployee({ name: 'A', salary: 1000 }));
      const d = await employees.createEmployee(makeEmployee({ name: 'D', salary: 2500 }));

      const preview = await payroll.previewPayroll(1, 2025);

      expect(preview.items.map((i) => i.employeeId)).toEqual([a, d]);
      expect(preview.totalCost).toBe(3150);
    });

    it('is empty with no active employees', async () => {
      await employees.createEmployee(makeEmployee({ status: 'exited' }));
      expect(await payroll.previewPayroll(2, 2024)).toEqual({ month: 2, year: 2024, totalCost: 0, items: [] });
    });

    it('writes nothing', async () => {
      await employees.createEmployee(makeEmployee());
      await payroll.previewPayroll(3, 2024);
      expect(await payroll.listPayrollRuns()).toEqual([]);
    });

    it('uses the configured deduction policy', async () => {
      await employees.createEmployee(makeEmployee({ salary: 1000 }));
      const custom = payrollService(dataSource, { policy: flatRateDeduction(0.2), logger: pino({ level: 'silent' }) });
      const preview = await custom.previewPayroll(3, 2024);
      expect(preview.items[0]).toMatchObject({ deductions: 200, net: 800 });
      expect(preview.totalCost).toBe(800);
    });
  });

  describe('approvePayroll', () => {
    it('stores the run exactly as previewed', async () => {
      await employees.createEmployee(makeEmployee({ name: 'A', salary: 1000 }));
      await employees.createEmployee(makeEmployee({ name: 'B', salary: 2500 }));
      await employees.createEmployee(makeEmployee({ name: 'C', salary: 4000, status: 'on_leave' }));

      const preview = await payroll.previewPayroll(4, 2024);
      const id = await payroll.approvePayroll(4, 2024);
      const run = await payroll.getPayrollRun(id);

      expect(run).not.toBeNull();
      expect(run?.id).toBe(id);
      expect(run?.month).toBe(4);
      expect(run?.year).toBe(2024);
      expect(run?.totalCost).toBe(preview.totalCost);
      expect(run?.items).toEqual(preview.items);
      expect(run?.approvedAt).toBeInstanceOf(Date);
    });

    it('stores a run with no items when nobody is active', async () => {
      const id = await payroll.approvePayroll(8, 2024);
      const run = await payroll.getPayrollRun(id);
      expect(run?.totalCost).toBe(0);
      expect(run?.items).toEqual([]);
    });

    it('creates a separate run each time a period is approved', async () => {
      await employees.createEmployee(makeEmployee());
      const first = await payroll.approvePayroll(5, 2024);
      const second = await payroll.approvePayroll(5, 2024);

      expect(second).not.toBe(first);
      expect((await payroll.getPayrollRun(first))?.totalCost).toBe(900);
      expect((await payroll.getPayrollRun(second))?.totalCost).toBe(900);
    });

    it('keeps approved history when employees change later', async () => {
      const id = await employees.createEmployee(makeEmployee({ name: 'Ada', salary: 1000 }));
      const runId = await payroll.approvePayroll(9, 2024);

      await employees.updateEmployee(id, { name: 'Ada Lovelace', salary: 3000 });
      await employees.terminateEmployee(id);

      const run = await payroll.getPayrollRun(runId);
      expect(run?.totalCost).toBe(900);
      expect(run?.items).toEqual([{ employeeId: id, name: 'Ada', gross: 1000, deductions: 100, net: 900 }]);
    });

    it('writes items in chunks', async () => {
      await employees.createEmployee(makeEmployee({ name: 'A', salary: 1000 }));
      await employees.createEmployee(makeEmployee({ name: 'B', salary: 2000 }));
      await employees.createEmployee(makeEmployee({ name: 'C', salary: 3000 }));
      const chunked = payrollService(dataSource, { itemChunkSize: 2, logger: pino({ level: 'silent' }) });
      const insert = jest.spyOn(EntityManager.prototype, 'insert');

      const id = await chunked.approvePayroll(11, 2024);

      expect(insert).toHaveBeenCalledTimes(2);
      const run = await chunked.getPayrollRun(id);
      expect(run?.items.map((i) => i.name)).toEqual(['A', 'B', 'C']);
      expect(run?.totalCost).toBe(5400);
    });

    it('rejects a chunk size below one', () => {
      expect(() => payrollService(dataSource, { itemChunkSize: 0 })).toThrow(RangeError);
    });

    it('rolls back the run when an item insert fails', async () => {
      await employees.createEmployee(makeEmployee());
      jest.spyOn(EntityManager.prototype, 'insert').mockRejectedValueOnce(new Error('write failed'));

      await expect(payroll.approvePayroll(10, 2024)).rejects.toThrow('write failed');
      expect(await payroll.listPayrollRuns()).toEqual([]);
    });
  });

  describe('listPayrollRuns', () => {
    it('orders runs by year then month, newest first', async () => {
      await payroll.approvePayroll(3, 2024);
      await payroll.approvePayroll(11, 2023);
      await payroll.approvePayroll(1, 2025);
      await payroll.approvePayroll(12, 2024);

      const runs = await payroll.listPayrollRuns();

      expect(runs.map((r) => [r.year, r.month])).toEqual([
        [2025, 1],
        [2024, 12],
        [2024, 3],
        [2023, 11],
      ]);
    });

    it('breaks ties by approval order', async () => {
      const first = await payroll.approvePayroll(7, 2024);
      const second = await payroll.approvePayroll(7, 2024);
      expect((await payroll.listPayrollRuns()).map((r) => r.id)).toEqual([first, second]);
    });

    it('returns summaries only', async () => {
      await employees.createEmployee(makeEmployee());
      const id = await payroll.approvePayroll(2, 2024);
      const [run] = await payroll.listPayrollRuns();
      expect(Object.keys(run).sort()).toEqual(['approvedAt', 'id', 'month', 'totalCost', 'year']);
      expect(run.id).toBe(id);
    });
  });

  describe('getPayrollRun', () => {
    it('returns null for an unknown id', async () => {
      expect(await payroll.getPayrollRun(77)).toBeNull();
    });
  });
});
