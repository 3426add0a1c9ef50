import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../../db/core/control-db";
import { sendError, successResponse } from "../../../../utils/responseHandler";
import { getAmendmentStats } from "./dashboard-handler";

const router = express.Router();

// Mounted ahead of the amendment router so "stats" is not taken for an id
router.get(
  "/stats",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      const stats = await getAmendmentStats(t);
      await t.commit();
      successResponse(res, "Amendment statistics retrieved successfully.", stats);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong while computing amendment statistics.");
    }
  })
);

export default router;
