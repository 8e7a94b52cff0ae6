import { Router } from 'express';
import healthRouter from './health';
import reportsRouter from './reports';

const router = Router();
router.use(healthRouter);
router.use('/reports', reportsRouter);

export default router;
