import type { DocumentStore } from './database';
import { errorMessage } from './errors';

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

const MAX_COLLECTIONS = 10;
const MAX_STATUS_ERROR_LENGTH = 80;

// Never throws: every failure ends up in the `database` status string
export async function runDiagnostics(
  store: DocumentStore | null,
  databaseUrl: string | undefined
): Promise<DiagnosticsReport> {
  const report: DiagnosticsReport = {
    backend: '✅ Running',
    database: '⚠️ Available but not initialized',
    database_url: null,
    database_name: null,
    connection_status: 'Not Connected',
    collections: [],
  };

  if (store === null) {
    return report;
  }

  report.database = '✅ Available';
  report.database_url = databaseUrl ? '✅ Set' : '❌ Not Set';
  report.database_name = store.name || '✅ Connected';
  report.connection_status = 'Connected';

  try {
    const collections = await store.listCollections();
    report.collections = collections.slice(0, MAX_COLLECTIONS);
    report.database = '✅ Connected & Working';
  } catch (error) {
    report.database = `⚠️ Connected but Error: ${errorMessage(error, MAX_STATUS_ERROR_LENGTH)}`;
  }

  return report;
}
