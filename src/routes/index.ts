import express from "express";
const router = express.Router();

import healthRoute from "./health";
import exerciseRoute from "./exercises";
import workoutRoute from "./workouts";
import catalogRoute from "./catalog";

router.use("/health", healthRoute);

router.use("/api/exercises", exerciseRoute);
router.use("/api/workouts", workoutRoute);
router.use("/api/catalog", catalogRoute);

export default router;
