import { Router } from 'express';
import { DataSource } from 'typeorm';
import { payrollService, type PayrollServiceOptions } from '../services/payrollService';
import { periodQuerySchema } from '../schemas';
import { previewToJson } from '../serializers';

export default function payrollRouter(dataSource: DataSource, options: PayrollServiceOptions = {}) {
  const router = Router();
  const payroll = payrollService(dataSource, options);

  router.get('/preview', async (req, res, next) => {
    try {
      const { month, year } = periodQuerySchema.parse(req.query);
      const preview = await payroll.previewPayroll(month, year);
      res.json(previewToJson(preview));
    } catch (err) {
      next(err);
    }
  });

  router.post('/approve', async (req, res, next) => {
    try {
      const { month, year } = periodQuerySchema.parse(req.query);
      const payrollId = await payroll.approvePayroll(month, year);
      res.json({ payroll_id: payrollId, message: 'Payroll approved' });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
