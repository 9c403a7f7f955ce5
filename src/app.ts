import express, { Express } from 'express';
import { AppContext } from './container';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createLeaveController } from './controllers/leave.controller';
import { createEmployeeController } from './controllers/employee.controller';
import { createReportController } from './controllers/report.controller';
import { createLeaveRoutes } from './routes/leave.routes';
import { createEmployeeRoutes } from './routes/employee.routes';
import { createPolicyRoutes, createReportRoutes } from './routes/report.routes';

export function createApp(ctx: AppContext): Express {
  const app = express();
  const reportController = createReportController(ctx);

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(express.json());

  // ─── Health check ───────────────────────────────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/leaves', createLeaveRoutes(createLeaveController(ctx)));
  app.use('/api/employees', createEmployeeRoutes(createEmployeeController(ctx)));
  app.use('/api/reports', createReportRoutes(reportController));
  app.use('/api/policies', createPolicyRoutes(reportController));

  // ─── Error handling ─────────────────────────────────────────────────────────
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
