import { Router } from 'express';

import { summarizeWorkouts } from '../controllers/summaries';

const router = Router();

router.post('/summary', (req, res) => {
  summarizeWorkouts(req, res);
});

export default router;
