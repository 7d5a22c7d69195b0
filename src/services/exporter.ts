import ExcelJS from 'exceljs';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { PlanningApplication } from '../types/planning';

export type ExportFormat = 'csv' | 'xlsx';

export interface ExportResult {
  buffer: Buffer;
  filename: string;
  mimeType: string;
}

export const EXPORT_HEADERS = [
  'Project ID',
  'Borough',
  'Title',
  'Address',
  'Submission Date',
  'Detected Keywords',
  'Application URL',
  'Source URL',
  'Scraped At'
];

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'csv' || value === 'xlsx';
}

function toRow(application: PlanningApplication): string[] {
  return [
    application.projectId,
    application.borough,
    application.title,
    application.address,
    application.submissionDate ?? '',
    application.detectedKeywords.join(', '),
    application.applicationUrl,
    application.sourceUrl,
    application.scrapedTimestamp
  ];
}

/**
 * Quote a CSV field when it holds a comma, quote or newline
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(applications: PlanningApplication[]): string {
  const lines = [EXPORT_HEADERS.map(escapeCsv).join(',')];
  for (const application of applications) {
    lines.push(toRow(application).map(escapeCsv).join(','));
  }
  return `${lines.join('\n')}\n`;
}

async function toXlsx(applications: PlanningApplication[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const sheet = workbook.addWorksheet('Planning Applications');
  sheet.addRow(EXPORT_HEADERS);
  sheet.getRow(1).font = { bold: true };

  for (const application of applications) {
    sheet.addRow(toRow(application));
  }

  sheet.columns = [
    { width: 18 },
    { width: 22 },
    { width: 60 },
    { width: 45 },
    { width: 16 },
    { width: 35 },
    { width: 50 },
    { width: 50 },
    { width: 25 }
  ];

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}

export async function exportApplications(
  applications: PlanningApplication[],
  format: ExportFormat
): Promise<ExportResult> {
  if (format === 'csv') {
    return {
      buffer: Buffer.from(toCsv(applications), 'utf-8'),
      filename: 'planning_applications_export.csv',
      mimeType: 'text/csv'
    };
  }

  return {
    buffer: await toXlsx(applications),
    filename: 'planning_applications_export.xlsx',
    mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
  };
}

/**
 * Export and write to `directory`; returns the written path
 */
export async function writeExport(
  applications: PlanningApplication[],
  format: ExportFormat,
  directory: string
): Promise<string> {
  const result = await exportApplications(applications, format);
  await mkdir(directory, { recursive: true });
  const filePath = path.join(directory, result.filename);
  await writeFile(filePath, result.buffer);
  console.log(`📄 Exported ${applications.length} applications to ${filePath}`);
  return filePath;
}
