import Database from 'better-sqlite3';
import * as path from 'path';
import fs from 'fs-extra';
import * as sqliteVec from 'sqlite-vec';
import { CollectionInfo, KnowledgeBaseStore, KnowledgeDocument, SearchResult, toCollectionName } from './types';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge:SQLite' });

interface MetaRow {
  key: string;
  value: string;
}

interface MatchRow {
  id: string;
  text: string;
  source: string;
  start_offset: number;
  created_at: number;
  distance: number;
}

/**
 * One SQLite file per collection. Vectors live in a sqlite-vec `vec0` table
 * keyed by the rowid of the matching `documents` row and are stored
 * normalized, so the L2 distance d of a match gives cosine = 1 - d²/2.
 */
export class SQLiteStore implements KnowledgeBaseStore {
  private connections: Map<string, Database.Database> = new Map();
  private dbDir: string;

  constructor(storagePath: string) {
    this.dbDir = storagePath;
  }

  async initialize(): Promise<void> {
    try {
      await fs.ensureDir(this.dbDir);
      log.info(`SQLite Knowledge Base initialized at ${this.dbDir}`);
    } catch (error) {
      log.error(`Failed to initialize SQLite Knowledge Base: ${error}`);
      throw error;
    }
  }

  private dbPath(name: string): string {
    return path.join(this.dbDir, `${toCollectionName(name)}.sqlite`);
  }

  // Only createCollection may bring a database file into existence
  private getDatabase(collectionName: string, create: boolean = false): Database.Database {
    const cleanName = toCollectionName(collectionName);
    const existing = this.connections.get(cleanName);
    if (existing) return existing;

    const db = new Database(this.dbPath(cleanName), { fileMustExist: !create });
    sqliteVec.load(db);
    db.pragma('journal_mode = WAL');

    db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT
      );

      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        text TEXT NOT NULL,
        source TEXT NOT NULL,
        start_offset INTEGER NOT NULL,
        created_at INTEGER
      );
    `);

    this.connections.set(cleanName, db);
    return db;
  }

  private readMeta(db: Database.Database): Map<string, string> {
    const rows = db.prepare('SELECT key, value FROM meta').all() as MetaRow[];
    return new Map(rows.map((row) => [row.key, row.value]));
  }

  private ensureVectorTable(db: Database.Database, dimension: number): void {
    const stored = this.readMeta(db).get('dimension');
    if (stored !== undefined) {
      const storedDim = parseInt(stored, 10);
      if (storedDim !== dimension) {
        throw new Error(`Collection stores ${storedDim}-dimensional vectors but received ${dimension}`);
      }
      return;
    }

    db.prepare("INSERT INTO meta (key, value) VALUES ('dimension', ?)").run(dimension.toString());
    db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS vectors USING vec0(
        embedding float[${dimension}]
      );
    `);
  }

  async hasCollection(name: string): Promise<boolean> {
    const cleanName = toCollectionName(name);
    if (this.connections.has(cleanName)) return true;
    return fs.pathExists(this.dbPath(cleanName));
  }

  async listCollections(): Promise<string[]> {
    if (!(await fs.pathExists(this.dbDir))) return [];
    const files = await fs.readdir(this.dbDir);
    return files
      .filter((f) => f.endsWith('.sqlite'))
      .map((f) => path.basename(f, '.sqlite'))
      .sort();
  }

  async createCollection(name: string, embeddingModel: string): Promise<void> {
    const db = this.getDatabase(name, true);
    db.prepare("INSERT OR REPLACE INTO meta (key, value) VALUES ('embedding_model', ?)").run(embeddingModel);
    log.info(`Created collection ${name} for ${embeddingModel}`);
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo | undefined> {
    if (!(await this.hasCollection(name))) return undefined;

    const db = this.getDatabase(name);
    const meta = this.readMeta(db);
    const { count } = db.prepare('SELECT COUNT(*) AS count FROM documents').get() as { count: number };
    const dimension = meta.get('dimension');

    return {
      name: toCollectionName(name),
      embeddingModel: meta.get('embedding_model') ?? 'unknown',
      dimension: dimension !== undefined ? parseInt(dimension, 10) : undefined,
      documentCount: count,
    };
  }

  async deleteCollection(name: string): Promise<void> {
    const cleanName = toCollectionName(name);

    const db = this.connections.get(cleanName);
    if (db) {
      db.close();
      this.connections.delete(cleanName);
    }

    const dbPath = this.dbPath(cleanName);
    if (await fs.pathExists(dbPath)) {
      // WAL mode leaves -wal and -shm files next to the database
      await Promise.all([dbPath, `${dbPath}-wal`, `${dbPath}-shm`].map((p) => fs.remove(p)));
      log.info(`Dropped collection ${name} (deleted ${dbPath})`);
    } else {
      log.warn(`Collection ${name} does not exist`);
    }
  }

  async addDocuments(collectionName: string, documents: KnowledgeDocument[]): Promise<void> {
    if (documents.length === 0) return;

    const db = this.getDatabase(collectionName);
    this.ensureVectorTable(db, documents[0].vector.length);

    const insertDoc = db.prepare(`
      INSERT INTO documents (id, text, source, start_offset, created_at)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertVec = db.prepare(`
      INSERT INTO vectors(rowid, embedding)
      VALUES (?, vec_normalize(?))
    `);

    const transaction = db.transaction((docs: KnowledgeDocument[]) => {
      for (const doc of docs) {
        const { lastInsertRowid } = insertDoc.run(
          doc.id,
          doc.text,
          doc.source,
          doc.offset,
          doc.created_at ?? Date.now()
        );
        // vec0 only accepts integer rowids; plain JS numbers bind as REAL
        insertVec.run(BigInt(lastInsertRowid), Buffer.from(new Float32Array(doc.vector).buffer));
      }
    });

    try {
      transaction(documents);
      log.info(`Added ${documents.length} documents to ${collectionName}`);
    } catch (error) {
      log.error(`Failed to add documents to ${collectionName}: ${error}`);
      throw error;
    }
  }

  async search(collectionName: string, queryVector: number[], limit: number): Promise<SearchResult[]> {
    if (!(await this.hasCollection(collectionName))) return [];
    const db = this.getDatabase(collectionName);

    // The vector table is created with the first document; until then the collection is empty
    const tableExists = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='vectors'").get();
    if (!tableExists) {
      return [];
    }

    const query = `
      WITH knn AS (
        SELECT rowid, distance
        FROM vectors
        WHERE embedding MATCH vec_normalize(?)
          AND k = ?
      )
      SELECT d.id, d.text, d.source, d.start_offset, d.created_at, knn.distance
      FROM knn
      JOIN documents d ON d.rowid = knn.rowid
      ORDER BY knn.distance
    `;

    const vectorBuffer = Buffer.from(new Float32Array(queryVector).buffer);
    const rows = db.prepare(query).all(vectorBuffer, BigInt(limit)) as MatchRow[];

    return rows.map((row) => ({
      document: {
        id: row.id,
        text: row.text,
        source: row.source,
        offset: row.start_offset,
        created_at: row.created_at,
      },
      score: 1 - (row.distance * row.distance) / 2,
    }));
  }

  async close(): Promise<void> {
    for (const db of this.connections.values()) {
      db.close();
    }
    this.connections.clear();
  }
}
