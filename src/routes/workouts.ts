import express from 'express';

import { exportWorkout } from '../controllers/exports';
import { listWorkouts } from '../controllers/workouts';

const router = express.Router();

router.get('/', listWorkouts);
router.post('/:id/export', exportWorkout);

export default router;
