import { EntityManager, Not } from 'typeorm';
import { Employee } from '../entities/Employee';
import type { EmployeeChanges, EmployeeFields, EmployeeStatus } from '../types';

const UPDATABLE_FIELDS = [
  'name',
  'role',
  'department',
  'salary',
  'bankAccount',
  'status',
  'contractPath',
] as const satisfies readonly (keyof EmployeeFields)[];

function definedChanges(changes: EmployeeChanges): EmployeeChanges {
  const out: EmployeeChanges = {};
  for (const key of UPDATABLE_FIELDS) {
    if (changes[key] !== undefined) Object.assign(out, { [key]: changes[key] });
  }
  return out;
}

/**
 * Employee CRUD bound to an entity manager. Pass `dataSource.manager` for
 * standalone use, or a transactional manager to join an outer transaction.
 *
 * Not-found is reported through `null`/`false` results, never thrown.
 */
export function employeeRepository(manager: EntityManager) {
  const repo = manager.getRepository(Employee);

  return {
    listEmployees(): Promise<Employee[]> {
      return repo.find({ order: { id: 'ASC' } });
    },

    listActiveEmployees(): Promise<Employee[]> {
      return repo.find({ where: { status: 'active' }, order: { id: 'ASC' } });
    },

    getEmployee(id: number): Promise<Employee | null> {
      return repo.findOneBy({ id });
    },

    async createEmployee(fields: EmployeeFields): Promise<number> {
      const row = repo.create({
        name: fields.name,
        role: fields.role ?? null,
        department: fields.department ?? null,
        salary: fields.salary,
        bankAccount: fields.bankAccount ?? null,
        status: fields.status ?? 'active',
        contractPath: fields.contractPath ?? null,
      });
      const saved = await repo.save(row);
      return saved.id;
    },

    // One UPDATE of only the supplied columns: there is no read-merge-write
    // step, so concurrent partial updates cannot overwrite each other's fields.
    async updateEmployee(id: number, changes: EmployeeChanges): Promise<boolean> {
      const values = definedChanges(changes);
      if (Object.keys(values).length === 0) {
        return (await repo.countBy({ id })) > 0;
      }
      const result = await repo.update({ id }, values);
      return (result.affected ?? 0) > 0;
    },

    async terminateEmployee(id: number): Promise<boolean> {
      const result = await repo.update({ id, status: Not<EmployeeStatus>('exited') }, { status: 'exited' });
      return (result.affected ?? 0) > 0;
    },
  };
}

export type EmployeeRepository = ReturnType<typeof employeeRepository>;
