import type { Transaction } from "sequelize";
import { Employee } from "./employee-model";
import { NotFoundError, toAppError } from "../../../utils/app-errors";
import type { CreateEmployeeInput, UpdateEmployeeInput } from "../../../validations/catalog-validation";

export const findEmployeeOrThrow = async (id: number, t?: Transaction | null) => {
  const employee = await Employee.findByPk(id, { transaction: t });
  if (!employee) throw new NotFoundError(`Employee ${id} not found`);
  return employee;
};

// Add a new employee
export const addEmployee = async (input: CreateEmployeeInput, t: Transaction) => {
  try {
    return await Employee.create(
      {
        employeeName: input.employeeName,
        initials: input.initials ?? null,
        email: input.email ?? null,
        windowsLogin: input.windowsLogin ?? null,
        isActive: input.isActive ?? true,
      },
      { transaction: t }
    );
  } catch (err) {
    throw toAppError(err);
  }
};

export const getEmployees = async (active?: boolean) => {
  return Employee.findAll({
    where: active === undefined ? {} : { isActive: active },
    order: [["employeeName", "ASC"]],
  });
};

// Update employee details
export const updateEmployee = async (id: number, input: UpdateEmployeeInput, t: Transaction) => {
  const employee = await findEmployeeOrThrow(id, t);
  employee.set(input);
  try {
    return await employee.save({ transaction: t });
  } catch (err) {
    throw toAppError(err);
  }
};

// Delete employee
export const deleteEmployee = async (id: number, t: Transaction) => {
  const employee = await findEmployeeOrThrow(id, t);
  await employee.destroy({ transaction: t });
};
