import express from "express";
import asyncHandler from "express-async-handler";
import dbInstance from "../../../db/core/control-db";
import { validate } from "../../../middleware/validation.middleware";
import { fromZodError } from "../../../utils/app-errors";
import { createdResponse, sendError, successResponse } from "../../../utils/responseHandler";
import {
  v_create_employee,
  v_employee_query,
  v_update_employee,
  type CreateEmployeeInput,
  type UpdateEmployeeInput,
} from "../../../validations/catalog-validation";
import { parseIdParam } from "../../../validations/zod-params";
import { addEmployee, deleteEmployee, findEmployeeOrThrow, getEmployees, updateEmployee } from "./employee-handler";

const router = express.Router();

router.post(
  "/",
  validate({ body: v_create_employee }),
  asyncHandler(async (req, res) => {
    const payload: CreateEmployeeInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const employee = await addEmployee(payload, t);
      await t.commit();
      createdResponse(res, "Employee added successfully.", employee);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during employee registration.");
    }
  })
);

router.get(
  "/",
  asyncHandler(async (req, res) => {
    try {
      const parsed = v_employee_query.safeParse(req.query);
      if (!parsed.success) throw fromZodError(parsed.error, "Invalid employee query");
      const employees = await getEmployees(parsed.data.active);
      successResponse(res, "Employees retrieved successfully.", employees);
    } catch (error) {
      sendError(res, error, "Something went wrong during employee retrieval.");
    }
  })
);

router.get(
  "/:id",
  asyncHandler(async (req, res) => {
    try {
      const employee = await findEmployeeOrThrow(parseIdParam(req.params.id));
      successResponse(res, "Employee retrieved successfully.", employee);
    } catch (error) {
      sendError(res, error, "Something went wrong during employee retrieval.");
    }
  })
);

router.put(
  "/:id",
  validate({ body: v_update_employee }),
  asyncHandler(async (req, res) => {
    const payload: UpdateEmployeeInput = req.body;
    const t = await dbInstance.transaction();
    try {
      const employee = await updateEmployee(parseIdParam(req.params.id), payload, t);
      await t.commit();
      successResponse(res, "Employee updated successfully.", employee);
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during employee update.");
    }
  })
);

router.delete(
  "/:id",
  asyncHandler(async (req, res) => {
    const t = await dbInstance.transaction();
    try {
      await deleteEmployee(parseIdParam(req.params.id), t);
      await t.commit();
      successResponse(res, "Employee deleted successfully.");
    } catch (error) {
      await t.rollback();
      sendError(res, error, "Something went wrong during employee deletion.");
    }
  })
);

export default router;
