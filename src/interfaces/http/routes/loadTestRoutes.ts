import { LoadTestController } from '@interfaces/http/controllers/LoadTestController';
import { Router } from 'express';

const router = Router();
const controller = new LoadTestController();

router.get('/load-test/info', controller.info);
router.get('/load-test/cpu', controller.cpu);
router.get('/load-test/memory', controller.memory);
router.get('/load-test/async', controller.asyncTask);

export { router as loadTestRoutes };
