import express from 'express';
import cors from 'cors';
import { DataSource } from 'typeorm';
import { AppConfig } from './config';
import { createMailer, Mailer } from './services/mailer';
import { errorHandler, notFoundHandler } from './middleware/errors';

import authRouter from './routes/auth';
import employeesRouter from './routes/employees';
import attendanceRouter from './routes/attendance';
import leaveRouter from './routes/leave';
import projectsRouter from './routes/projects';
import tasksRouter from './routes/tasks';
import dashboardRouter from './routes/dashboard';
import payrollRouter from './routes/payroll';
import okrRouter from './routes/okr';
import clientRouter from './routes/client';
import reportsRouter from './routes/reports';

export type AppOptions = {
  config: AppConfig;
  mailer?: Mailer;
};

export function createApp(dataSource: DataSource, { config, mailer = createMailer(config.smtp) }: AppOptions) {
  const app = express();
  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
    })
  );
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ success: true, data: { status: 'ok', database: dataSource.isInitialized } });
  });

  // every router receives the shared DataSource
  app.use('/api/auth', authRouter(dataSource, config));
  app.use('/api/employees', employeesRouter(dataSource, config));
  app.use('/api/attendance', attendanceRouter(dataSource, config));
  app.use('/api/leave', leaveRouter(dataSource, config));
  app.use('/api/projects', projectsRouter(dataSource, config));
  app.use('/api/tasks', tasksRouter(dataSource, config));
  app.use('/api/dashboard', dashboardRouter(dataSource, config));
  app.use('/api/payroll', payrollRouter(dataSource, config, mailer));
  app.use('/api/okrs', okrRouter(dataSource, config));
  app.use('/api/client', clientRouter(dataSource, config));
  app.use('/api/reports', reportsRouter(dataSource, config));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
