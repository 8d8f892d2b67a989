import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';
import { config } from '../config';

// sqlite has no zoned timestamp type
const approvedAtType = config.database.driver === 'sqljs' ? 'datetime' : 'timestamptz';

@Entity('payrolls')
export class Payroll {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'month', type: 'integer' })
  month!: number;

  @Column({ name: 'year', type: 'integer' })
  year!: number;

  // snapshot at approval, never recomputed
  @Column({ name: 'total_cost', type: 'double precision' })
  totalCost!: number;

  @CreateDateColumn({ name: 'approved_at', type: approvedAtType })
  approvedAt!: Date;
}
