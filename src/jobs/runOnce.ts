import dotenv from 'dotenv';
import { loadSettings } from '../config/settings';
import { DatabaseService } from '../services/database';
import { ExportFormat, isExportFormat, writeExport } from '../services/exporter';
import { ScrapeOrchestrator } from '../services/scrapeOrchestrator';
import { BoroughScrapeResult } from '../types/planning';

// Load environment variables
dotenv.config();

export interface RunOnceOptions {
  boroughs?: string[];
  exportFormat?: ExportFormat;
  exportDir?: string;
}

export interface RunOnceSummary {
  results: BoroughScrapeResult[];
  exportPath: string | null;
}

/**
 * Parse --borough=<name> (repeatable), --export=csv|xlsx and --out=<dir>
 */
export function parseRunOnceArgs(args: string[]): RunOnceOptions {
  const options: RunOnceOptions = {};

  for (const arg of args) {
    const [flag, ...rest] = arg.split('=');
    const value = rest.join('=').trim();

    if (flag === '--borough' && value) {
      options.boroughs = [...(options.boroughs ?? []), value];
    } else if (flag === '--export') {
      if (!isExportFormat(value)) {
        throw new Error(`Unsupported export format: ${value || '(empty)'}`);
      }
      options.exportFormat = value;
    } else if (flag === '--out' && value) {
      options.exportDir = value;
    }
  }

  return options;
}

function printSummary(results: BoroughScrapeResult[]): void {
  console.log('\n=== SCRAPING SUMMARY ===');
  for (const result of results) {
    const status = result.success ? '✅' : '❌';
    const detail = result.success
      ? `${result.totalFound} found, ${result.newApplications} new, ${result.requestsMade} requests`
      : result.error ?? 'unknown error';
    console.log(`${status} ${result.borough}: ${detail}`);

    for (const application of result.applications) {
      console.log(`    - ${application.projectId}: ${application.title} [${application.detectedKeywords.join(', ')}]`);
    }
  }

  const totalFound = results.reduce((sum, result) => sum + result.totalFound, 0);
  const totalNew = results.reduce((sum, result) => sum + result.newApplications, 0);
  console.log(`Total matches: ${totalFound} (${totalNew} new)`);
  console.log('========================\n');
}

/**
 * Run the borough scrape once (for manual runs or external cron)
 */
async function runOnce(options: RunOnceOptions = {}): Promise<RunOnceSummary> {
  console.log('Starting one-time planning portal scraping...');
  const settings = loadSettings();

  const databaseService = new DatabaseService({
    url: settings.supabaseUrl,
    serviceRoleKey: settings.supabaseServiceRoleKey
  });

  console.log('Testing database connection...');
  const dbHealthy = await databaseService.testConnection();
  if (!dbHealthy) {
    throw new Error('Database connection failed');
  }

  const orchestrator = new ScrapeOrchestrator({
    store: databaseService,
    settings: settings.scraping
  });

  const results = options.boroughs && options.boroughs.length > 0
    ? await orchestrator.scrapeSpecific(options.boroughs)
    : await orchestrator.scrapeAll();

  printSummary(results);

  let exportPath: string | null = null;
  if (options.exportFormat) {
    const applications = await databaseService.query();
    exportPath = await writeExport(applications, options.exportFormat, options.exportDir ?? process.cwd());
  }

  console.log('✅ One-time scraping completed');
  return { results, exportPath };
}

if (require.main === module) {
  Promise.resolve()
    .then(() => runOnce(parseRunOnceArgs(process.argv.slice(2))))
    .then(() => {
      console.log('Script completed');
      process.exit(0);
    })
    .catch((error) => {
      console.error('❌ One-time scraping failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}

export { runOnce };
