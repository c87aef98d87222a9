/**
 * Query Routes
 * Layer: Interfaces (HTTP)
 *
 *   POST /api/v1/query  { "question": "...", "execute": false }  →  controller.ask
 */
import { Router } from 'express';

import { QueryController } from '@interfaces/http/controllers/QueryController';
import { validateBody } from '@interfaces/http/middleware/validation';
import { askBodySchema } from '@shared/schemas';

const router = Router();
const controller = new QueryController();

router.post('/query', validateBody(askBodySchema), controller.ask);

export { router as queryRoutes };
