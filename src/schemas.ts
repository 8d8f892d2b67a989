import { z } from 'zod';
import { EMPLOYEE_STATUSES, type EmployeeChanges, type EmployeeFields } from './types';

const optionalText = z.string().trim().nullable().optional();

export const employeeCreateSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  role: optionalText,
  department: optionalText,
  salary: z.number().finite().nonnegative('Salary cannot be negative'),
  bank_account: optionalText,
  status: z.enum(EMPLOYEE_STATUSES).optional(),
  contract_path: optionalText,
});

export const employeeUpdateSchema = employeeCreateSchema.partial();

export type EmployeeCreateInput = z.infer<typeof employeeCreateSchema>;
export type EmployeeUpdateInput = z.infer<typeof employeeUpdateSchema>;

export const periodQuerySchema = z.object({
  month: z.coerce.number().int().min(1).max(12),
  year: z.coerce.number().int().min(1).max(9999),
});

export type PeriodQuery = z.infer<typeof periodQuerySchema>;

// ids are postgres integer (int4) keys
export const MAX_ID = 2147483647;

const idSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().min(1).max(MAX_ID));

/** Route ids that cannot name a row resolve to null rather than a validation error. */
export function parseId(raw: string): number | null {
  const parsed = idSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function toEmployeeFields(input: EmployeeCreateInput): EmployeeFields {
  return {
    name: input.name,
    role: input.role,
    department: input.department,
    salary: input.salary,
    bankAccount: input.bank_account,
    status: input.status,
    contractPath: input.contract_path,
  };
}

// absent keys stay absent so the repository leaves those columns alone
export function toEmployeeChanges(input: EmployeeUpdateInput): EmployeeChanges {
  const changes: EmployeeChanges = {};
  if (input.name !== undefined) changes.name = input.name;
  if (input.role !== undefined) changes.role = input.role;
  if (input.department !== undefined) changes.department = input.department;
  if (input.salary !== undefined) changes.salary = input.salary;
  if (input.bank_account !== undefined) changes.bankAccount = input.bank_account;
  if (input.status !== undefined) changes.status = input.status;
  if (input.contract_path !== undefined) changes.contractPath = input.contract_path;
  return changes;
}
