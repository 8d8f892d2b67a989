import { Router } from 'express';
import { DataSource } from 'typeorm';
import { payrollService, type PayrollServiceOptions } from '../services/payrollService';
import { parseId } from '../schemas';
import { runToJson, summaryToJson } from '../serializers';
import { notFound } from '../errors';

export default function payrollRunsRouter(dataSource: DataSource, options: PayrollServiceOptions = {}) {
  const router = Router();
  const payroll = payrollService(dataSource, options);

  router.get('/', async (_req, res, next) => {
    try {
      const runs = await payroll.listPayrollRuns();
      res.json(runs.map(summaryToJson));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      const run = id === null ? null : await payroll.getPayrollRun(id);
      if (!run) return next(notFound('Payroll not found'));
      res.json(runToJson(run));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
