import { Router } from 'express';
import { CPE_CORE_VERSION } from '@core/index';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/health', (_req, res) => {
  const response: ApiResponse<{ status: string; version: string }> = {
    success: true,
    data: { status: 'ok', version: CPE_CORE_VERSION },
  };
  res.json(response);
});

export default router;
