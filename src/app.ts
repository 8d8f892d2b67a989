import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import { DataSource } from 'typeorm';
import employeesRouter from './routes/employee';
import payrollRouter from './routes/payroll';
import payrollRunsRouter from './routes/payrolls';
import healthRouter from './routes/health';
import { requestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { flatRateDeduction } from './services/payrollCalculator';
import { config } from './config';

export type AppOptions = {
  frontendUrl?: string;
  deductionRate?: number;
};

export function createApp(dataSource: DataSource, options: AppOptions = {}) {
  const app = express();
  app.use(cors({
    origin: options.frontendUrl ?? config.frontendUrl,
    credentials: true
  }));
  app.use(express.json());
  app.use(requestLogger);

  const payrollOptions = { policy: flatRateDeduction(options.deductionRate ?? config.deductionRate) };

  app.use('/health', healthRouter(dataSource));
  app.use('/employees', employeesRouter(dataSource));
  app.use('/payroll', payrollRouter(dataSource, payrollOptions));
  app.use('/payrolls', payrollRunsRouter(dataSource, payrollOptions));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
