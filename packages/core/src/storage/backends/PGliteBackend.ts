/**
 * PGliteBackend - StorageBackend on PGlite (embedded Postgres) through drizzle-orm
 *
 * A PGlite instance owns its data directory, so every connection the pool
 * opens for one path shares a single PGliteDatabase. PGlite runs one query
 * or transaction at a time; connections never see each other's partial
 * writes. Opening a database applies schema.sql, so a fresh directory (or
 * ":memory:") is usable immediately.
 *
 * Usage:
 *   const storage = await PGliteBackend.open('/project/.roster/data');
 *   const person = await storage.createPerson({ ... });
 *   await storage.close();
 */

import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite';
import { count, eq, inArray } from 'drizzle-orm';
import { randomUUID } from 'crypto';
import { mkdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import type {
  PersonRecord,
  CommentRecord,
  NewPersonInput,
  SeedPerson,
} from '@roster/types';
import { StorageBackend, type SeedResult, type StorageStats } from '../StorageBackend.js';
import { people, comments, tables, personColumns, commentColumns } from '../schema.js';
import { MEMORY_DATABASE } from '../../config/ConfigLoader.js';
import { DatabaseError, NotFoundError, RosterError, toError } from '../../errors/RosterError.js';
import { validateCommentBody, validateNewComment, validateNewPerson } from '../../validation/recordValidation.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

type RosterDatabase = PgliteDatabase<typeof tables>;
type RosterTransaction = Parameters<Parameters<RosterDatabase['transaction']>[0]>[0];

/**
 * Read schema.sql from beside the storage modules.
 */
function loadSchemaSQL(): string {
  try {
    return readFileSync(join(__dirname, '..', 'schema.sql'), 'utf-8');
  } catch {
    // Not copied into dist; read it from the source tree
    const srcPath = join(__dirname, '..', '..', '..', '..', '..', '..', 'packages', 'core', 'src', 'storage', 'schema.sql');
    return readFileSync(srcPath, 'utf-8');
  }
}

async function openClient(path: string): Promise<PGlite> {
  let client: PGlite | null = null;
  try {
    if (path === MEMORY_DATABASE) {
      client = await PGlite.create();
    } else {
      mkdirSync(dirname(path), { recursive: true });
      client = await PGlite.create(path);
    }
    await client.exec(loadSchemaSQL());
    return client;
  } catch (err) {
    await client?.close();
    throw new DatabaseError(
      `Cannot open database: ${toError(err).message}`,
      { filePath: path },
      { cause: err, suggestion: 'Check database.path in .roster/config.yaml' }
    );
  }
}

/**
 * One database (a data directory, or ":memory:") shared by any number of
 * connections. Opened by the first retain(), closed when the last
 * connection releases it.
 */
export class PGliteDatabase {
  private opening: Promise<PGlite> | null = null;
  private refs = 0;

  constructor(readonly path: string) {}

  async retain(): Promise<PGlite> {
    const opening = (this.opening ??= openClient(this.path));
    this.refs++;
    try {
      return await opening;
    } catch (err) {
      this.refs--;
      if (this.opening === opening) {
        this.opening = null;
      }
      throw err;
    }
  }

  async release(): Promise<void> {
    if (this.refs === 0) return;
    this.refs--;
    const opening = this.opening;
    if (this.refs > 0 || !opening) return;

    this.opening = null;
    const client = await opening;
    await client.close();
  }
}

export class PGliteBackend extends StorageBackend {
  private readonly database: PGliteDatabase;
  private readonly db: RosterDatabase;
  private readonly now: () => Date;
  private closed = false;

  private constructor(database: PGliteDatabase, client: PGlite, now: () => Date) {
    super();
    this.database = database;
    this.db = drizzle(client, { schema: tables });
    this.now = now;
  }

  /**
   * A new connection to a (possibly shared) database.
   *
   * @param now - clock used for createdAt/updatedAt
   */
  static async connect(database: PGliteDatabase, options: { now?: () => Date } = {}): Promise<PGliteBackend> {
    const client = await database.retain();
    return new PGliteBackend(database, client, options.now ?? (() => new Date()));
  }

  /**
   * Open (creating if needed) the database at `path` for this connection alone.
   */
  static open(path: string, options: { now?: () => Date } = {}): Promise<PGliteBackend> {
    return PGliteBackend.connect(new PGliteDatabase(path), options);
  }

  get path(): string {
    return this.database.path;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.database.release();
  }

  // ========================================
  // People
  // ========================================

  async createPerson(fields: NewPersonInput): Promise<PersonRecord> {
    const valid = validateNewPerson(fields);
    return this.run('createPerson', () =>
      this.db.transaction((tx) => this.insertPerson(tx, valid))
    );
  }

  async findPerson(id: string): Promise<PersonRecord> {
    const [person] = await this.run('findPerson', () =>
      this.db.select(personColumns).from(people).where(eq(people.id, id)).limit(1)
    );
    if (!person) {
      throw new NotFoundError('Person', id);
    }
    return person;
  }

  async findPeople(ids: readonly string[]): Promise<Array<PersonRecord | null>> {
    if (ids.length === 0) return [];
    const rows = await this.run('findPeople', () =>
      this.db.select(personColumns).from(people).where(inArray(people.id, [...ids]))
    );
    const byId = new Map(rows.map((row) => [row.id, row]));
    return ids.map((id) => byId.get(id) ?? null);
  }

  async listPeople(): Promise<PersonRecord[]> {
    return this.run('listPeople', () =>
      this.db.select(personColumns).from(people).orderBy(people.seq)
    );
  }

  async deletePerson(id: string): Promise<void> {
    const deleted = await this.run('deletePerson', () =>
      this.db.transaction((tx) => tx.delete(people).where(eq(people.id, id)).returning({ id: people.id }))
    );
    if (deleted.length === 0) {
      throw new NotFoundError('Person', id);
    }
  }

  // ========================================
  // Comments
  // ========================================

  async createComment(personId: string, body: string): Promise<CommentRecord> {
    const valid = validateNewComment({ personId, comment: body });
    return this.run('createComment', () =>
      this.db.transaction(async (tx) => {
        const [owner] = await tx
          .select({ id: people.id })
          .from(people)
          .where(eq(people.id, valid.personId))
          .limit(1);
        if (!owner) {
          throw new NotFoundError('Person', valid.personId, { operation: 'createComment' });
        }
        return this.insertComment(tx, valid.personId, valid.comment);
      })
    );
  }

  async findComment(id: string): Promise<CommentRecord> {
    const [comment] = await this.run('findComment', () =>
      this.db.select(commentColumns).from(comments).where(eq(comments.id, id)).limit(1)
    );
    if (!comment) {
      throw new NotFoundError('Comment', id);
    }
    return comment;
  }

  async listComments(): Promise<CommentRecord[]> {
    return this.run('listComments', () =>
      this.db.select(commentColumns).from(comments).orderBy(comments.seq)
    );
  }

  async commentsForPerson(personId: string): Promise<CommentRecord[]> {
    return this.run('commentsForPerson', () =>
      this.db.select(commentColumns).from(comments).where(eq(comments.personId, personId)).orderBy(comments.seq)
    );
  }

  async commentsForPeople(personIds: readonly string[]): Promise<CommentRecord[][]> {
    if (personIds.length === 0) return [];
    const rows = await this.run('commentsForPeople', () =>
      this.db
        .select(commentColumns)
        .from(comments)
        .where(inArray(comments.personId, [...personIds]))
        .orderBy(comments.seq)
    );
    const byPerson = new Map<string, CommentRecord[]>();
    for (const row of rows) {
      const list = byPerson.get(row.personId);
      if (list) {
        list.push(row);
      } else {
        byPerson.set(row.personId, [row]);
      }
    }
    return personIds.map((id) => byPerson.get(id) ?? []);
  }

  // ========================================
  // Maintenance
  // ========================================

  async seed(data: SeedPerson): Promise<SeedResult> {
    const { comments: bodies, ...fields } = data;
    const person = validateNewPerson(fields);
    const validBodies = bodies.map(validateCommentBody);

    return this.run('seed', () =>
      this.db.transaction(async (tx) => {
        const created = await this.insertPerson(tx, person);
        const stored: CommentRecord[] = [];
        for (const body of validBodies) {
          stored.push(await this.insertComment(tx, created.id, body));
        }
        return { person: created, comments: stored };
      })
    );
  }

  async getStats(): Promise<StorageStats> {
    return this.run('getStats', async () => {
      const [personRow] = await this.db.select({ value: count() }).from(people);
      const [commentRow] = await this.db.select({ value: count() }).from(comments);
      return {
        personCount: personRow?.value ?? 0,
        commentCount: commentRow?.value ?? 0,
      };
    });
  }

  // ========================================
  // Internals
  // ========================================

  private async insertPerson(
    tx: RosterTransaction,
    fields: NewPersonInput & { avatar: string | null }
  ): Promise<PersonRecord> {
    const timestamp = this.now().toISOString();
    const [row] = await tx
      .insert(people)
      .values({
        id: randomUUID(),
        firstName: fields.firstName,
        lastName: fields.lastName,
        email: fields.email,
        jobTitle: fields.jobTitle,
        avatar: fields.avatar,
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .returning(personColumns);
    if (!row) {
      throw new DatabaseError('Insert into people returned no row', { operation: 'insertPerson' });
    }
    return row;
  }

  private async insertComment(tx: RosterTransaction, personId: string, body: string): Promise<CommentRecord> {
    const timestamp = this.now().toISOString();
    const [row] = await tx
      .insert(comments)
      .values({
        id: randomUUID(),
        comment: body,
        personId,
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .returning(commentColumns);
    if (!row) {
      throw new DatabaseError('Insert into comments returned no row', { operation: 'insertComment' });
    }
    return row;
  }

  /**
   * Run a driver call, passing RosterErrors through and wrapping anything
   * else in DatabaseError.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RosterError) throw err;
      throw new DatabaseError(`${operation} failed: ${toError(err).message}`, { operation }, { cause: err });
    }
  }
}
