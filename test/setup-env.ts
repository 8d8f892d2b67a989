import 'reflect-metadata';

process.env.LOG_LEVEL = 'silent';
process.env.DB_DRIVER = 'sqljs';
