import type { Employee } from './entities/Employee';
import type { EmployeeStatus, PayrollLine, PayrollPreview, PayrollRun, PayrollRunSummary } from './types';

export type EmployeeResponse = {
  id: number;
  name: string;
  role: string | null;
  department: string | null;
  salary: number;
  bank_account: string | null;
  status: EmployeeStatus;
  contract_path: string | null;
};

export type PayrollItemResponse = {
  employee_id: number;
  name: string;
  gross: number;
  deductions: number;
  net: number;
};

export type PayrollPreviewResponse = {
  month: number;
  year: number;
  total_cost: number;
  items: PayrollItemResponse[];
};

export type PayrollSummaryResponse = {
  id: number;
  month: number;
  year: number;
  total_cost: number;
  approved_at: string;
};

export type PayrollRunResponse = PayrollSummaryResponse & {
  items: PayrollItemResponse[];
};

export function employeeToJson(e: Employee): EmployeeResponse {
  return {
    id: e.id,
    name: e.name,
    role: e.role,
    department: e.department,
    salary: e.salary,
    bank_account: e.bankAccount,
    status: e.status,
    contract_path: e.contractPath,
  };
}

export function lineToJson(line: PayrollLine): PayrollItemResponse {
  return {
    employee_id: line.employeeId,
    name: line.name,
    gross: line.gross,
    deductions: line.deductions,
    net: line.net,
  };
}

export function previewToJson(preview: PayrollPreview): PayrollPreviewResponse {
  return {
    month: preview.month,
    year: preview.year,
    total_cost: preview.totalCost,
    items: preview.items.map(lineToJson),
  };
}

export function summaryToJson(run: PayrollRunSummary): PayrollSummaryResponse {
  return {
    id: run.id,
    month: run.month,
    year: run.year,
    total_cost: run.totalCost,
    approved_at: run.approvedAt.toISOString(),
  };
}

export function runToJson(run: PayrollRun): PayrollRunResponse {
  return { ...summaryToJson(run), items: run.items.map(lineToJson) };
}
