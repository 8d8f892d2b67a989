import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateInitialTables1680000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS employees (
        id SERIAL PRIMARY KEY,
        name VARCHAR NOT NULL,
        role VARCHAR,
        department VARCHAR,
        salary DOUBLE PRECISION NOT NULL,
        bank_account VARCHAR,
        status VARCHAR NOT NULL DEFAULT 'active',
        contract_path VARCHAR,
        CONSTRAINT "CHK_employees_salary" CHECK ("salary" >= 0),
        CONSTRAINT "CHK_employees_status" CHECK (status IN ('active', 'on_leave', 'exited'))
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS payrolls (
        id SERIAL PRIMARY KEY,
        month INTEGER NOT NULL,
        year INTEGER NOT NULL,
        total_cost DOUBLE PRECISION NOT NULL,
        approved_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS payroll_items (
        id SERIAL PRIMARY KEY,
        payroll_id INTEGER NOT NULL REFERENCES payrolls(id) ON DELETE CASCADE,
        employee_id INTEGER NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
        employee_name VARCHAR NOT NULL,
        gross DOUBLE PRECISION NOT NULL,
        deductions DOUBLE PRECISION NOT NULL,
        net DOUBLE PRECISION NOT NULL
      );
    `);

    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_payroll_items_payroll ON payroll_items(payroll_id);`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_payrolls_period ON payrolls(year, month);`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS idx_payrolls_period;`);
    await queryRunner.query(`DROP INDEX IF EXISTS idx_payroll_items_payroll;`);
    await queryRunner.query(`DROP TABLE IF EXISTS payroll_items;`);
    await queryRunner.query(`DROP TABLE IF EXISTS payrolls;`);
    await queryRunner.query(`DROP TABLE IF EXISTS employees;`);
  }
}
