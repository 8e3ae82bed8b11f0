/** HTTP 接口层：工作端 express 应用，同步端点 + 任务队列端点，委托应用层用例。 */
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { errorMessage } from '../../domain/index.js';
import { registerLipsyncRoutes, type LipsyncRouteDeps } from './lipsync-routes.js';

export { registerLipsyncRoutes, statusForCode, OUTPUT_FILENAME, type LipsyncRouteDeps } from './lipsync-routes.js';

export interface WorkerAppDeps extends LipsyncRouteDeps {
  /** 推理服务地址（/health 中展示） */
  inferenceServer: string;
  /** 设置后 /api 下所有路由要求 Authorization: Bearer <token> */
  token?: string;
  /** 请求体上限；内联 base64 媒体可能很大 */
  bodyLimit?: string;
}

function requireBearer(token: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (req.get('authorization') === `Bearer ${token}`) {
      next();
      return;
    }
    res.status(401).json({ error: 'Unauthorized' });
  };
}

export function createApp(deps: WorkerAppDeps): Express {
  const app = express();
  app.use(express.json({ limit: deps.bodyLimit ?? '512mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', inferenceServer: deps.inferenceServer });
  });

  if (deps.token) app.use('/api', requireBearer(deps.token));
  registerLipsyncRoutes(app, deps);

  // express.json 解析失败等未捕获错误
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : 500;
    deps.logger.warn(`Request rejected: ${errorMessage(error)}`, { status });
    res.status(status).json({
      error: errorMessage(error),
      code: status === 400 || status === 413 ? 'VALIDATION_ERROR' : 'INTERNAL_ERROR',
    });
  });

  return app;
}
