import { Entity, PrimaryGeneratedColumn, Column, Check } from 'typeorm';
import { EMPLOYEE_STATUSES, type EmployeeStatus } from '../types';

@Entity('employees')
@Check('CHK_employees_salary', '"salary" >= 0')
export class Employee {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'name', type: 'varchar' })
  name!: string;

  @Column({ name: 'role', type: 'varchar', nullable: true })
  role!: string | null;

  @Column({ name: 'department', type: 'varchar', nullable: true })
  department!: string | null;

  // monthly gross
  @Column({ name: 'salary', type: 'double precision' })
  salary!: number;

  @Column({ name: 'bank_account', type: 'varchar', nullable: true })
  bankAccount!: string | null;

  @Column({ name: 'status', type: 'simple-enum', enum: [...EMPLOYEE_STATUSES], default: 'active' })
  status!: EmployeeStatus;

  // opaque reference to the stored contract document
  @Column({ name: 'contract_path', type: 'varchar', nullable: true })
  contractPath!: string | null;
}
