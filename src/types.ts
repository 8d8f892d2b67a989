export const EMPLOYEE_STATUSES = ['active', 'on_leave', 'exited'] as const;

export type EmployeeStatus = (typeof EMPLOYEE_STATUSES)[number];

export type EmployeeFields = {
  name: string;
  role?: string | null;
  department?: string | null;
  salary: number; // monthly gross
  bankAccount?: string | null;
  status?: EmployeeStatus;
  contractPath?: string | null;
};

export type EmployeeChanges = Partial<EmployeeFields>;

export type PayrollLine = {
  employeeId: number;
  name: string;
  gross: number;
  deductions: number;
  net: number;
};

export type PayrollPreview = {
  month: number; // 1-12
  year: number;
  totalCost: number;
  items: PayrollLine[];
};

export type PayrollRunSummary = {
  id: number;
  month: number;
  year: number;
  totalCost: number;
  approvedAt: Date;
};

export type PayrollRun = PayrollRunSummary & {
  items: PayrollLine[];
};
