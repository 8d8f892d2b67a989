import { Employee } from './Employee';
import { Payroll } from './Payroll';
import { PayrollItem } from './PayrollItem';

export { Employee, Payroll, PayrollItem };

export const entities = [Employee, Payroll, PayrollItem];
