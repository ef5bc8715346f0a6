import express, { type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import path from 'path';

import { analyzeSchema } from './analysis';
import { type AppConfig, loadConfig } from './config';
import { ConnectorRegistry, createDefaultRegistry } from './connectors/registry';
import { InvalidSchemaError, errorMessage, isClientError } from './errors';
import { countRelationships } from './infer';
import { ingestDDL } from './ingest/ddl';
import { type SchemaSnapshot, buildAnalysisWorkbook, toGraphDocument, toRelationshipDocument, toSnapshot } from './output';
import { sampleSchema } from './samples';
import type { AnalysisResult } from './types/schema';
import { createLogger, type Logger } from './utils/logger';

export type AppOptions = {
  config?: AppConfig;
  logger?: Logger;
  registry?: ConnectorRegistry;
};

export const createApp = (options: AppOptions = {}) => {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);
  const registry = options.registry ?? createDefaultRegistry({ pgSchema: config.pgSchema });

  const app = express();
  const upload = multer();

  app.use(cors());
  app.use(express.json({ limit: config.bodyLimit }));

  const analyze = (raw: unknown, source: string): AnalysisResult => {
    const result = analyzeSchema(raw);
    logger.info(
      {
        source,
        database: result.database,
        tables: result.schema.tables.length,
        relationships: countRelationships(result.relationships),
        warnings: result.warnings.length
      },
      'schema analyzed'
    );
    for (const warning of result.warnings) logger.warn({ code: warning.code }, warning.message);
    return result;
  };

  const fail = (res: Response, err: unknown, fallback: string) => {
    if (isClientError(err)) {
      const issues = err instanceof InvalidSchemaError ? err.issues : undefined;
      return res.status(400).json({ error: errorMessage(err, fallback), ...(issues ? { issues } : {}) });
    }
    logger.error({ err }, fallback);
    return res.status(500).json({ error: errorMessage(err, fallback) });
  };

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/connectors', (_req, res) => {
    res.json({ dialects: registry.names() });
  });

  app.post('/api/analyze', (req, res) => {
    try {
      res.json(toSnapshot(analyze(req.body, 'json')));
    } catch (err) {
      fail(res, err, 'Schema analysis failed');
    }
  });

  app.post('/api/export', (req, res) => {
    try {
      const format = String(req.query.format || 'json').toLowerCase();
      if (format !== 'json' && format !== 'xlsx') {
        return res.status(400).json({ error: 'format must be json or xlsx' });
      }

      const result = analyze(req.body, 'export');
      const base = `${result.database || 'schema'}_schema_graph`.replace(/[^a-zA-Z0-9._-]/g, '_');

      if (format === 'xlsx') {
        res.setHeader('Content-Disposition', `attachment; filename="${base}.xlsx"`);
        res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        return res.send(buildAnalysisWorkbook(result));
      }

      res.setHeader('Content-Disposition', `attachment; filename="${base}.json"`);
      res.json({
        relationships: toRelationshipDocument(result.relationships),
        graph: toGraphDocument(result.graph)
      });
    } catch (err) {
      fail(res, err, 'Export failed');
    }
  });

  app.post('/api/ingest/ddl', (req, res) => {
    try {
      const { ddl, dialect, database } = req.body || {};
      if (typeof ddl !== 'string' || !ddl.trim()) return res.status(400).json({ error: 'DDL is required' });
      const raw = ingestDDL(ddl, typeof dialect === 'string' ? dialect : 'postgresql', typeof database === 'string' ? database : '');
      res.json(toSnapshot(analyze(raw, 'ddl')));
    } catch (err) {
      fail(res, err, 'DDL ingest failed');
    }
  });

  app.post('/api/ingest/db', async (req, res) => {
    try {
      const { dbType, connectionString } = req.body || {};
      if (typeof dbType !== 'string' || typeof connectionString !== 'string' || !dbType || !connectionString) {
        return res.status(400).json({ error: 'dbType + connectionString required' });
      }

      const connector = registry.get(dbType);
      const raw = await connector.extract(connectionString);
      res.json(toSnapshot(analyze(raw, connector.dialect)));
    } catch (err) {
      fail(res, err, 'DB ingest failed');
    }
  });

  app.post('/api/ingest/sqlite', upload.single('file'), async (req, res) => {
    const file = req.file;
    if (!file) return res.status(400).json({ error: 'SQLite file required' });

    const tmpPath = path.join(config.tmpDir, `schemagraph-${Date.now()}-${Math.random().toString(36).slice(2, 8)}.db`);
    let snapshot: SchemaSnapshot;
    try {
      await fs.writeFile(tmpPath, file.buffer);
      const raw = await registry.get('sqlite').extract(tmpPath);
      const database = path.basename(file.originalname, path.extname(file.originalname));
      snapshot = toSnapshot(analyze({ ...raw, database }, 'sqlite'));
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      return fail(res, err, 'SQLite ingest failed');
    }

    // The upload is gone before the client hears back.
    await fs.rm(tmpPath, { force: true });
    res.json(snapshot);
  });

  app.get('/api/samples', (_req, res) => {
    try {
      res.json(toSnapshot(analyze(sampleSchema, 'samples')));
    } catch (err) {
      fail(res, err, 'Failed to load samples');
    }
  });

  return app;
};
