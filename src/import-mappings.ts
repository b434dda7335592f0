/**
 * Imports a filled-in gap workbook into the mapping tables.
 *
 * Usage: import-mappings [workbook]
 * Without an argument, reads insert_mapping.xlsx from the first configured
 * mapping output directory.
 */

import * as path from 'path';
import { logFlow } from './utils/logging.js';
import { describeError } from './utils/errors.js';
import { loadReportSettings } from './utils/report-settings.js';
import { ConnectionManager } from './services/connection-manager.js';
import { BigQueryClient } from './services/bigquery-client.js';
import { BigQueryMappingWriter } from './services/warehouse-sources.js';
import { MappingImporter } from './services/mapping-importer.js';
import { GAP_WORKBOOK_NAME } from './services/workbook-writer.js';

async function main(): Promise<void> {
  const settings = await loadReportSettings();
  const [mappingDir] = settings.mappingOutputDirs;
  const workbookPath = process.argv[2] ?? path.join(mappingDir ?? '.', GAP_WORKBOOK_NAME);

  const connections = ConnectionManager.getInstance();
  const client = new BigQueryClient();
  await client.configure({
    projectId: connections.getProjectId(),
    location: connections.getLocation(),
    keyFilename: connections.getKeyFilename()
  });

  const importer = new MappingImporter(new BigQueryMappingWriter(client, connections));
  const summary = await importer.importFile(workbookPath);
  logFlow('MAIN', 'INFO', 'Mapping import finished', summary);
}

main().catch((error: unknown) => {
  logFlow('MAIN', 'ERROR', 'Mapping import failed', { error: describeError(error) });
  process.exitCode = 1;
});
