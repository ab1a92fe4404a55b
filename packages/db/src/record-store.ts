import { asc, eq, sql } from 'drizzle-orm';
import type { ExistingRecordView, ParsedJob, RecordStore } from '@jobsift/source-sdk';
import type { Database } from './client.js';
import { employers, jobSnapshots, jobs } from './schema.js';

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

interface RecordRow {
  id: string;
  title: string;
  employer: string | null;
  url: string | null;
}

const recordColumns = {
  id: jobs.id,
  title: jobs.title,
  employer: employers.name,
  url: jobs.url,
};

const insertionOrder = [asc(jobs.createdAt), asc(jobs.id)];

function toView(row: RecordRow): ExistingRecordView {
  return {
    id: row.id,
    title: row.title,
    employer: row.employer ?? undefined,
    url: row.url ?? undefined,
  };
}

function employerNameEquals(name: string) {
  return sql`lower(${employers.name}) = ${name.trim().toLowerCase()}`;
}

async function findEmployerId(tx: Transaction, name: string): Promise<string | undefined> {
  const [existing] = await tx.select({ id: employers.id }).from(employers).where(employerNameEquals(name)).limit(1);
  return existing?.id;
}

/**
 * A concurrent insert of the same name loses on the `lower(name)` index and reads the winner's row.
 */
async function getOrCreateEmployer(tx: Transaction, name: string): Promise<string> {
  const existingId = await findEmployerId(tx, name);
  if (existingId) {
    return existingId;
  }

  const [created] = await tx
    .insert(employers)
    .values({ name: name.trim() })
    .onConflictDoNothing()
    .returning({ id: employers.id });
  if (created) {
    return created.id;
  }

  const winnerId = await findEmployerId(tx, name);
  if (!winnerId) {
    throw new Error(`Failed to create employer '${name}'`);
  }

  return winnerId;
}

/**
 * PostgreSQL-backed RecordStore. Lookups return records oldest first; an insert writes the
 * employer, the job and its first snapshot in one transaction.
 */
export function createRecordStore(db: Database): RecordStore {
  const selectRecords = () =>
    db.select(recordColumns).from(jobs).leftJoin(employers, eq(jobs.employerId, employers.id));

  return {
    async findByUrl(url: string) {
      const [row] = await selectRecords()
        .where(eq(jobs.url, url))
        .orderBy(...insertionOrder)
        .limit(1);
      return row ? toView(row) : undefined;
    },

    async listByEmployer(employer: string) {
      const rows = await selectRecords()
        .where(employerNameEquals(employer))
        .orderBy(...insertionOrder);
      return rows.map(toView);
    },

    async listAll() {
      const rows = await selectRecords().orderBy(...insertionOrder);
      return rows.map(toView);
    },

    async insert(job: ParsedJob) {
      return db.transaction(async (tx) => {
        const employerId = job.employer ? await getOrCreateEmployer(tx, job.employer) : null;

        const [row] = await tx
          .insert(jobs)
          .values({
            employerId,
            title: job.title,
            url: job.url ?? null,
            location: job.location ?? null,
            source: job.source,
            status: job.noLongerAccepting ? 'closed' : 'active',
            payMin: job.payMin ?? null,
            payMax: job.payMax ?? null,
            jobCode: job.jobCode ?? null,
            noLongerAccepting: job.noLongerAccepting,
            rawText: job.rawText,
          })
          .returning({ id: jobs.id });
        if (!row) {
          throw new Error(`Failed to insert job '${job.title}'`);
        }

        await tx.insert(jobSnapshots).values({ jobId: row.id, rawText: job.rawText });
        return row.id;
      });
    },

    async remove(id: string) {
      await db.delete(jobs).where(eq(jobs.id, id));
    },
  };
}
