import { Router } from 'express';
import { DataSource } from 'typeorm';
import { employeeRepository } from '../services/employeeRepository';
import { employeeCreateSchema, employeeUpdateSchema, parseId, toEmployeeChanges, toEmployeeFields } from '../schemas';
import { employeeToJson } from '../serializers';
import { HttpError, notFound } from '../errors';

export default function employeesRouter(dataSource: DataSource) {
  const router = Router();
  const repo = employeeRepository(dataSource.manager);

  router.get('/', async (_req, res, next) => {
    try {
      const list = await repo.listEmployees();
      res.json(list.map(employeeToJson));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      const row = id === null ? null : await repo.getEmployee(id);
      if (!row) return next(notFound('Employee not found'));
      res.json(employeeToJson(row));
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const input = employeeCreateSchema.parse(req.body);
      const id = await repo.createEmployee(toEmployeeFields(input));
      const created = await repo.getEmployee(id);
      if (!created) throw new HttpError(500, `Employee ${id} vanished after insert`);
      res.status(201).json(employeeToJson(created));
    } catch (err) {
      next(err);
    }
  });

  router.put('/:id', async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      if (id === null) return next(notFound('Employee not found'));
      const changes = toEmployeeChanges(employeeUpdateSchema.parse(req.body));
      const ok = await repo.updateEmployee(id, changes);
      const updated = ok ? await repo.getEmployee(id) : null;
      if (!updated) return next(notFound('Employee not found'));
      res.json(employeeToJson(updated));
    } catch (err) {
      next(err);
    }
  });

  // employees are never deleted; this marks them exited
  router.delete('/:id', async (req, res, next) => {
    try {
      const id = parseId(req.params.id);
      const ok = id === null ? false : await repo.terminateEmployee(id);
      if (!ok) return next(notFound('Employee not found or already exited'));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
