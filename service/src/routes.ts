/**
 * Catalog Read Routes
 *
 * JSON views over {@link TopicMetadata}: schemas, tables, columns and the
 * handles the engine would keep. Schema names contain `/`, so clients pass
 * them URL-encoded (`public%2Fdefault`).
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import {
  type ColumnHandle,
  type ColumnMetadata,
  type ConnectorSession,
  type Logger,
  type TopicMetadata,
  formatSqlType,
  isInvalidSchemaError,
  isSchemaNotFoundError,
  isTableNotFoundError,
  SchemaNotFoundError,
} from '@topicsql/core';

// ============================================================================
// Types
// ============================================================================

/** Error response body */
export interface CatalogErrorResponse {
  error: {
    message: string;
    type: string;
    code: number;
  };
}

/** Column as rendered in responses; `type` is the SQL type name */
export interface ColumnView {
  name: string;
  type: string;
  positionIndices: readonly number[];
  fieldNames: readonly string[];
  hidden: boolean;
  internal: boolean;
  comment?: string;
}

type ErrorStatus = 404 | 422 | 500;

/** The HTTP surface carries no engine session */
const HTTP_SESSION: ConnectorSession = null;

// ============================================================================
// Helper Functions
// ============================================================================

function renderColumn(column: ColumnMetadata): ColumnView {
  const view: ColumnView = {
    name: column.name,
    type: formatSqlType(column.type),
    positionIndices: column.positionIndices,
    fieldNames: column.fieldNames,
    hidden: column.hidden,
    internal: column.internal,
  };
  if (column.comment !== undefined) {
    view.comment = column.comment;
  }
  return view;
}

function classifyError(error: unknown): { status: ErrorStatus; type: string } {
  if (isSchemaNotFoundError(error)) {
    return { status: 404, type: 'NoSuchSchema' };
  }
  if (isTableNotFoundError(error)) {
    return { status: 404, type: 'NoSuchTable' };
  }
  if (isInvalidSchemaError(error)) {
    return { status: 422, type: 'InvalidSchema' };
  }
  return { status: 500, type: 'InternalServerError' };
}

/**
 * Map a thrown error to an error response. Unexpected errors are logged.
 */
function catalogError(c: Context, error: unknown, logger: Logger): Response {
  const { status, type } = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === 500) {
    logger.error('Catalog request failed', { path: c.req.path, error: message });
  }

  const body: CatalogErrorResponse = {
    error: { message, type, code: status },
  };
  return c.json(body, status);
}

// ============================================================================
// Routes
// ============================================================================

/**
 * Create the catalog routes, to be mounted at `/v1`.
 *
 * - GET /schemas - List schema names
 * - GET /schemas/{schema} - Check that a schema exists
 * - GET /schemas/{schema}/tables - List tables of a schema
 * - GET /schemas/{schema}/tables/{table} - Table metadata
 * - GET /schemas/{schema}/tables/{table}/handles - Table and column handles
 * - GET /schemas/{schema}/columns - Columns of every table (or `?table=`)
 */
export function createCatalogRoutes(metadata: TopicMetadata, logger: Logger): Hono {
  const api = new Hono();

  // -------------------------------------------------------------------------
  // GET /schemas - List schema names
  // -------------------------------------------------------------------------
  api.get('/schemas', async (c) => {
    try {
      const schemas = await metadata.listSchemaNames(HTTP_SESSION);
      return c.json({ schemas });
    } catch (error) {
      return catalogError(c, error, logger);
    }
  });

  // -------------------------------------------------------------------------
  // GET /schemas/{schema} - Check that a schema exists
  // -------------------------------------------------------------------------
  api.get('/schemas/:schema', async (c) => {
    const schema = c.req.param('schema');
    try {
      if (!(await metadata.schemaExists(HTTP_SESSION, schema))) {
        throw new SchemaNotFoundError(schema);
      }
      return c.json({ schema });
    } catch (error) {
      return catalogError(c, error, logger);
    }
  });

  // -------------------------------------------------------------------------
  // GET /schemas/{schema}/tables - List tables
  // -------------------------------------------------------------------------
  api.get('/schemas/:schema/tables', async (c) => {
    try {
      const tables = await metadata.listTables(HTTP_SESSION, c.req.param('schema'));
      return c.json({ tables });
    } catch (error) {
      return catalogError(c, error, logger);
    }
  });

  // -------------------------------------------------------------------------
  // GET /schemas/{schema}/tables/{table} - Table metadata
  // -------------------------------------------------------------------------
  api.get('/schemas/:schema/tables/:table', async (c) => {
    try {
      const handle = metadata.getTableHandle(HTTP_SESSION, {
        schemaName: c.req.param('schema'),
        tableName: c.req.param('table'),
      });
      const table = await metadata.getTableMetadata(HTTP_SESSION, handle);
      return c.json({
        table: table.table,
        columns: table.columns.map(renderColumn),
      });
    } catch (error) {
      return catalogError(c, error, logger);
    }
  });

  // -------------------------------------------------------------------------
  // GET /schemas/{schema}/tables/{table}/handles - Handles
  // -------------------------------------------------------------------------
  api.get('/schemas/:schema/tables/:table/handles', async (c) => {
    try {
      const tableHandle = metadata.getTableHandle(HTTP_SESSION, {
        schemaName: c.req.param('schema'),
        tableName: c.req.param('table'),
      });
      const columnHandles: ColumnHandle[] = [
        ...(await metadata.getColumnHandles(HTTP_SESSION, tableHandle)).values(),
      ];
      return c.json({ tableHandle, columnHandles });
    } catch (error) {
      return catalogError(c, error, logger);
    }
  });

  // -------------------------------------------------------------------------
  // GET /schemas/{schema}/columns - Columns of matching tables
  // -------------------------------------------------------------------------
  api.get('/schemas/:schema/columns', async (c) => {
    try {
      const columns = await metadata.listTableColumns(HTTP_SESSION, {
        schema: c.req.param('schema'),
        table: c.req.query('table'),
      });
      const tables: Record<string, ColumnView[]> = {};
      for (const [name, tableColumns] of columns) {
        tables[name] = tableColumns.map(renderColumn);
      }
      return c.json({ tables });
    } catch (error) {
      return catalogError(c, error, logger);
    }
  });

  return api;
}
