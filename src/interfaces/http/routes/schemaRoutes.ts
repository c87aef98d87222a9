/**
 * Schema Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/schema  →  controller.list
 */
import { Router } from 'express';

import { SchemaController } from '@interfaces/http/controllers/SchemaController';

const router = Router();
const controller = new SchemaController();

router.get('/schema', controller.list);

export { router as schemaRoutes };
