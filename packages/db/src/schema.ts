import { sql } from 'drizzle-orm';
import { pgTable, uuid, text, varchar, timestamp, integer, boolean, index, uniqueIndex } from 'drizzle-orm/pg-core';

export const employers = pgTable(
  'employers',
  {
    id: uuid().primaryKey().defaultRandom(),
    name: varchar({ length: 255 }).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [uniqueIndex('uq_employers_name_lower').on(sql`lower(${t.name})`)],
);

export const jobs = pgTable(
  'jobs',
  {
    id: uuid().primaryKey().defaultRandom(),
    employerId: uuid('employer_id').references(() => employers.id, { onDelete: 'set null' }),
    title: text().notNull(),
    url: text(),
    location: varchar({ length: 255 }),
    source: varchar({ length: 30 }).notNull(),
    status: varchar({ length: 20 }).default('active').notNull(),
    payMin: integer('pay_min'),
    payMax: integer('pay_max'),
    jobCode: varchar('job_code', { length: 50 }),
    noLongerAccepting: boolean('no_longer_accepting').default(false).notNull(),
    rawText: text('raw_text').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [
    index('idx_jobs_url').on(t.url),
    index('idx_jobs_employer_id').on(t.employerId),
    index('idx_jobs_created_at').on(t.createdAt, t.id),
    index('idx_jobs_status').on(t.status),
  ],
);

export const jobSnapshots = pgTable(
  'job_snapshots',
  {
    id: uuid().primaryKey().defaultRandom(),
    jobId: uuid('job_id')
      .notNull()
      .references(() => jobs.id, { onDelete: 'cascade' }),
    rawText: text('raw_text').notNull(),
    capturedAt: timestamp('captured_at').defaultNow().notNull(),
  },
  (t) => [index('idx_job_snapshots_job_id').on(t.jobId)],
);
