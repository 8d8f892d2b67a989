import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, type Relation } from 'typeorm';
import { Payroll } from './Payroll';
import { Employee } from './Employee';

@Entity('payroll_items')
export class PayrollItem {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @ManyToOne(() => Payroll, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'payroll_id' })
  payroll?: Relation<Payroll>;

  @Column({ name: 'payroll_id', type: 'integer' })
  payrollId!: number;

  @ManyToOne(() => Employee, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'employee_id' })
  employee?: Relation<Employee>;

  @Column({ name: 'employee_id', type: 'integer' })
  employeeId!: number;

  // name as it was when the run was approved
  @Column({ name: 'employee_name', type: 'varchar' })
  employeeName!: string;

  @Column({ name: 'gross', type: 'double precision' })
  gross!: number;

  @Column({ name: 'deductions', type: 'double precision' })
  deductions!: number;

  @Column({ name: 'net', type: 'double precision' })
  net!: number;
}
