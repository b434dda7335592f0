/**
 * ConnectionManager - Centralized service for resolving warehouse connection details
 *
 * Resolves the project, the datasets of the three source systems and every
 * table reference from environment variables, falling back to the default
 * table names. The environment is validated once, when the manager is built.
 */

import { z } from 'zod';
import { logFlow } from '../utils/logging.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * Logical warehouse tables read or written by the pipeline
 */
export type WarehouseTable =
  | 'ledgerEntries'
  | 'holdings'
  | 'positions'
  | 'ledgerAccountEntries'
  | 'ledgerAccounts'
  | 'transactionTypeMapping'
  | 'investmentTypeMapping'
  | 'investmentMapping'
  | 'ledgerAccountMapping'
  | 'positionMapping'
  | 'codeLabels';

type Dataset = 'investment' | 'accounting' | 'mapping';

interface TableLocation {
  dataset: Dataset;
  envVar: string;
  defaultTableId: string;
}

const TABLE_LOCATIONS: Readonly<Record<WarehouseTable, TableLocation>> = {
  ledgerEntries: { dataset: 'investment', envVar: 'BIGQUERY_LEDGER_ENTRIES_TABLE', defaultTableId: 'gl_export_hist' },
  positions: { dataset: 'investment', envVar: 'BIGQUERY_POSITIONS_TABLE', defaultTableId: 'list_of_investments_positions_hist' },
  holdings: { dataset: 'mapping', envVar: 'BIGQUERY_HOLDINGS_TABLE', defaultTableId: 'investment_holdings' },
  ledgerAccountEntries: { dataset: 'accounting', envVar: 'BIGQUERY_GL_ENTRIES_TABLE', defaultTableId: 'gl_entry' },
  ledgerAccounts: { dataset: 'accounting', envVar: 'BIGQUERY_GL_ACCOUNTS_TABLE', defaultTableId: 'gl_account' },
  transactionTypeMapping: { dataset: 'mapping', envVar: 'BIGQUERY_TRANSACTION_TYPE_TABLE', defaultTableId: 'transaction_type_mapping' },
  investmentTypeMapping: { dataset: 'mapping', envVar: 'BIGQUERY_INVESTMENT_TYPE_TABLE', defaultTableId: 'investment_type_mapping' },
  investmentMapping: { dataset: 'mapping', envVar: 'BIGQUERY_INVESTMENT_MAPPING_TABLE', defaultTableId: 'investment_mapping' },
  ledgerAccountMapping: { dataset: 'mapping', envVar: 'BIGQUERY_LEDGER_ACCOUNT_MAPPING_TABLE', defaultTableId: 'ledger_account_mapping' },
  positionMapping: { dataset: 'mapping', envVar: 'BIGQUERY_POSITION_MAPPING_TABLE', defaultTableId: 'position_mapping' },
  codeLabels: { dataset: 'mapping', envVar: 'BIGQUERY_CODE_LABELS_TABLE', defaultTableId: 'code_labels' }
};

const identifier = z.string().regex(/^[A-Za-z0-9_.-]+$/, 'may only contain letters, digits, _ . and -');

const environmentSchema = z.object({
  GOOGLE_CLOUD_PROJECT_ID: identifier,
  GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1).optional(),
  BIGQUERY_LOCATION: z.string().min(1).default('US'),
  BIGQUERY_INVESTMENT_DATASET_ID: identifier.default('investment_system'),
  BIGQUERY_ACCOUNTING_DATASET_ID: identifier.default('accounting_system'),
  BIGQUERY_MAPPING_DATASET_ID: identifier.default('regulatory_mapping')
});

export interface ConnectionDetails {
  projectId: string;
  location: string;
  keyFilename?: string;
  datasets: Readonly<Record<Dataset, string>>;
  tables: Readonly<Record<WarehouseTable, string>>;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Validates the environment into connection details. The first invalid
 * variable is reported by name.
 */
export function resolveConnectionDetails(env: NodeJS.ProcessEnv = process.env): ConnectionDetails {
  const parsed = environmentSchema.safeParse({
    GOOGLE_CLOUD_PROJECT_ID: env.GOOGLE_CLOUD_PROJECT_ID ?? '',
    GOOGLE_APPLICATION_CREDENTIALS: blankToUndefined(env.GOOGLE_APPLICATION_CREDENTIALS),
    BIGQUERY_LOCATION: blankToUndefined(env.BIGQUERY_LOCATION),
    BIGQUERY_INVESTMENT_DATASET_ID: blankToUndefined(env.BIGQUERY_INVESTMENT_DATASET_ID),
    BIGQUERY_ACCOUNTING_DATASET_ID: blankToUndefined(env.BIGQUERY_ACCOUNTING_DATASET_ID),
    BIGQUERY_MAPPING_DATASET_ID: blankToUndefined(env.BIGQUERY_MAPPING_DATASET_ID)
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue ? issue.path.join('.') : 'environment', issue ? issue.message : 'invalid');
  }

  const tables: Record<string, string> = {};
  for (const [table, location] of Object.entries(TABLE_LOCATIONS)) {
    const tableId = blankToUndefined(env[location.envVar]) ?? location.defaultTableId;
    const checked = identifier.safeParse(tableId);
    if (!checked.success) {
      throw new ConfigurationError(location.envVar, checked.error.issues[0]?.message ?? 'invalid');
    }
    tables[table] = tableId;
  }

  const config = parsed.data;
  return {
    projectId: config.GOOGLE_CLOUD_PROJECT_ID,
    location: config.BIGQUERY_LOCATION,
    keyFilename: config.GOOGLE_APPLICATION_CREDENTIALS,
    datasets: {
      investment: config.BIGQUERY_INVESTMENT_DATASET_ID,
      accounting: config.BIGQUERY_ACCOUNTING_DATASET_ID,
      mapping: config.BIGQUERY_MAPPING_DATASET_ID
    },
    tables: {
      ledgerEntries: tableIdOf(tables, 'ledgerEntries'),
      holdings: tableIdOf(tables, 'holdings'),
      positions: tableIdOf(tables, 'positions'),
      ledgerAccountEntries: tableIdOf(tables, 'ledgerAccountEntries'),
      ledgerAccounts: tableIdOf(tables, 'ledgerAccounts'),
      transactionTypeMapping: tableIdOf(tables, 'transactionTypeMapping'),
      investmentTypeMapping: tableIdOf(tables, 'investmentTypeMapping'),
      investmentMapping: tableIdOf(tables, 'investmentMapping'),
      ledgerAccountMapping: tableIdOf(tables, 'ledgerAccountMapping'),
      positionMapping: tableIdOf(tables, 'positionMapping'),
      codeLabels: tableIdOf(tables, 'codeLabels')
    }
  };
}

function tableIdOf(tables: Readonly<Record<string, string>>, table: WarehouseTable): string {
  return tables[table] ?? TABLE_LOCATIONS[table].defaultTableId;
}

export class ConnectionManager {
  private static instance: ConnectionManager | null = null;

  constructor(private readonly details: ConnectionDetails) {}

  /**
   * Get the process-wide instance, resolved from process.env on first use
   */
  public static getInstance(): ConnectionManager {
    if (!ConnectionManager.instance) {
      ConnectionManager.instance = ConnectionManager.fromEnvironment();
    }
    return ConnectionManager.instance;
  }

  public static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ConnectionManager {
    return new ConnectionManager(resolveConnectionDetails(env));
  }

  public getProjectId(): string {
    return this.details.projectId;
  }

  public getLocation(): string {
    return this.details.location;
  }

  public getKeyFilename(): string | undefined {
    return this.details.keyFilename;
  }

  public getDatasetId(table: WarehouseTable): string {
    return this.details.datasets[TABLE_LOCATIONS[table].dataset];
  }

  public getTableId(table: WarehouseTable): string {
    return this.details.tables[table];
  }

  /**
   * Get the fully qualified BigQuery table ID in the format `project.dataset.table`
   */
  public getFullyQualifiedTableId(table: WarehouseTable): string {
    return `\`${this.getProjectId()}.${this.getDatasetId(table)}.${this.getTableId(table)}\``;
  }

  /**
   * Log the current connection details (without the credentials path)
   */
  public logConnectionDetails(): object {
    const connectionDetails = {
      projectId: this.details.projectId,
      location: this.details.location,
      datasets: this.details.datasets,
      hasKeyFile: !!this.details.keyFilename
    };
    logFlow('CONNECTION_MANAGER', 'INFO', 'Connection details', connectionDetails);
    return connectionDetails;
  }
}
