import type { PayrollLine } from '../types';

/** Maps a gross amount to the amount withheld from it. */
export type DeductionPolicy = (gross: number) => number;

export const DEFAULT_DEDUCTION_RATE = 0.1;

/**
 * Flat percentage of gross. Placeholder policy, not a tax engine: swap in a
 * bracket or benefits policy here without touching the payroll service.
 */
export function flatRateDeduction(rate: number = DEFAULT_DEDUCTION_RATE): DeductionPolicy {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new RangeError(`Deduction rate must be between 0 and 1, got ${rate}`);
  }
  return (gross) => gross * rate;
}

export type PayableEmployee = {
  id: number;
  name: string;
  salary: number;
};

export function calculate(employee: PayableEmployee, policy: DeductionPolicy = flatRateDeduction()): PayrollLine {
  const gross = Number(employee.salary);
  const deductions = policy(gross);
  return {
    employeeId: employee.id,
    name: employee.name,
    gross,
    deductions,
    net: gross - deductions,
  };
}
