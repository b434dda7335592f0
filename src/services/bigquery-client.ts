/**
 * BigQuery Client Service - Warehouse Connection and Query Execution
 *
 * Handles:
 * - BigQuery connection configuration
 * - Parameterised query execution with proper error handling
 * - Streaming inserts into mapping tables
 */

import { BigQuery, type BigQueryOptions } from '@google-cloud/bigquery';
import { logFlow } from '../utils/logging.js';
import { describeError } from '../utils/errors.js';
import type { Cell } from '../types/report.js';

export interface BigQueryConfig {
  projectId: string;
  location: string;
  keyFilename?: string;
}

export type QueryParams = Readonly<Record<string, string | number>>;

/**
 * Executes read queries. Rows come back keyed by result column name.
 */
export interface QueryRunner {
  runQuery(sql: string, params?: QueryParams): Promise<Record<string, unknown>[]>;
}

/**
 * Appends rows to a warehouse table
 */
export interface RowInserter {
  insertRows(datasetId: string, tableId: string, rows: readonly Record<string, Cell>[]): Promise<void>;
}

export class BigQueryClient implements QueryRunner, RowInserter {
  private bigquery: BigQuery | null = null;
  private config: BigQueryConfig | null = null;

  // ========================================================================
  // CONFIGURATION
  // ========================================================================

  async configure(config: BigQueryConfig): Promise<void> {
    logFlow('BIGQUERY_CONFIGURE', 'ENTRY', 'Configuring BigQuery client', {
      projectId: config.projectId,
      location: config.location,
      hasKeyFile: !!config.keyFilename
    });

    this.config = config;

    try {
      const options: BigQueryOptions = { projectId: config.projectId };
      if (config.keyFilename) {
        options.keyFilename = config.keyFilename;
      }

      this.bigquery = new BigQuery(options);

      await this.testConnection();

      logFlow('BIGQUERY_CONFIGURE', 'EXIT', `BigQuery connected: ${config.projectId}`);
    } catch (error) {
      const errorMessage = describeError(error);
      logFlow('BIGQUERY_CONFIGURE', 'ERROR', 'Failed to configure BigQuery', { error: errorMessage });
      throw new Error(`Failed to configure BigQuery: ${errorMessage}`);
    }
  }

  private async testConnection(): Promise<void> {
    logFlow('BIGQUERY_TEST_CONNECTION', 'ENTRY', 'Testing BigQuery connection');
    try {
      await this.runQuery('SELECT 1 AS ok');
      logFlow('BIGQUERY_TEST_CONNECTION', 'EXIT', 'Connection verified');
    } catch (error) {
      const errorMessage = describeError(error);
      throw new Error(`BigQuery connection test failed: ${errorMessage}`);
    }
  }

  private requireClient(): { bigquery: BigQuery; config: BigQueryConfig } {
    if (!this.bigquery || !this.config) {
      logFlow('BIGQUERY_CLIENT', 'ERROR', 'BigQuery client not initialized');
      throw new Error('BigQuery client not initialized. Call configure() first.');
    }
    return { bigquery: this.bigquery, config: this.config };
  }

  // ========================================================================
  // QUERY EXECUTION
  // ========================================================================

  async runQuery(sql: string, params: QueryParams = {}): Promise<Record<string, unknown>[]> {
    const { bigquery, config } = this.requireClient();

    logFlow('BIGQUERY_EXECUTE_QUERY', 'ENTRY', 'Executing SQL query', {
      sqlLength: sql.length,
      sqlPreview: sql.substring(0, 100) + (sql.length > 100 ? '...' : ''),
      params
    });

    const startTime = Date.now();
    try {
      const [rows] = await bigquery.query({
        query: sql,
        params,
        location: config.location
      });

      const executionTime = Date.now() - startTime;
      logFlow('BIGQUERY_EXECUTE_QUERY', 'EXIT', 'Query execution completed', {
        rowCount: rows.length,
        executionTime: `${executionTime}ms`
      });
      return rows;
    } catch (error) {
      const errorMessage = describeError(error);
      const executionTime = Date.now() - startTime;

      logFlow('BIGQUERY_EXECUTE_QUERY', 'ERROR', 'Query execution failed', {
        error: errorMessage,
        executionTime: `${executionTime}ms`
      });
      throw new Error(`Query execution failed: ${errorMessage}`);
    }
  }

  async insertRows(datasetId: string, tableId: string, rows: readonly Record<string, Cell>[]): Promise<void> {
    const { bigquery } = this.requireClient();
    if (rows.length === 0) {
      return;
    }

    logFlow('BIGQUERY_INSERT', 'ENTRY', `Inserting ${rows.length} rows into ${datasetId}.${tableId}`);
    try {
      await bigquery.dataset(datasetId).table(tableId).insert([...rows]);
      logFlow('BIGQUERY_INSERT', 'EXIT', `Inserted ${rows.length} rows into ${datasetId}.${tableId}`);
    } catch (error) {
      const errorMessage = describeError(error);
      logFlow('BIGQUERY_INSERT', 'ERROR', 'Insert failed', { table: `${datasetId}.${tableId}`, error: errorMessage });
      throw new Error(`Insert into ${datasetId}.${tableId} failed: ${errorMessage}`);
    }
  }
}
