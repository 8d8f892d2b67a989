import AppDataSource from '../ormconfig';
import { employeeRepository } from '../services/employeeRepository';
import { employeeCreateSchema, toEmployeeFields } from '../schemas';
import { logger } from '../logger';
import * as path from 'path';
import { promises as fs } from 'fs';
import { z } from 'zod';

const seedFileSchema = z.object({
  employees: z.array(employeeCreateSchema).default([]),
});

type SeedSchema = z.infer<typeof seedFileSchema>;

export async function loadSeedFile(file = process.env.SEED_FILE ?? path.resolve(process.cwd(), 'src/seeds/data.json')): Promise<SeedSchema> {
  const raw = await fs.readFile(file, 'utf8');
  return seedFileSchema.parse(JSON.parse(raw));
}

async function runSeed() {
  await AppDataSource.initialize();
  logger.info('DataSource initialized for seeding');

  const seed = await loadSeedFile();
  const repo = employeeRepository(AppDataSource.manager);
  const existingNames = new Set((await repo.listEmployees()).map((e) => e.name));

  // Employees: insert if no employee with the same name exists
  let inserted = 0;
  for (const e of seed.employees) {
    if (existingNames.has(e.name)) continue;
    await repo.createEmployee(toEmployeeFields(e));
    existingNames.add(e.name);
    inserted++;
  }

  logger.info({ inserted, skipped: seed.employees.length - inserted }, 'Seeding complete');
  await AppDataSource.destroy();
}

if (require.main === module) {
  runSeed().catch((err) => {
    logger.error({ err }, 'Seed failed');
    process.exit(1);
  });
}
