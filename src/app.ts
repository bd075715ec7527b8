import { Hono } from 'hono';
import { createStakingRoutes } from './routes/staking';
import type { StakingEngine } from './staking';

export function createApp(engine: StakingEngine) {
  const app = new Hono();

  app.get('/health', (c) => c.json({ success: true, status: 'ok' }));
  app.route('/staking', createStakingRoutes(engine));

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404));

  return app;
}
