import ExcelJS from 'exceljs';
import { escapeCsv, exportApplications, isExportFormat, toCsv } from '../../src/services/exporter';
import { PlanningApplication } from '../../src/types/planning';

const application: PlanningApplication = {
  projectId: '24/AP/0234',
  borough: 'Southwark',
  title: 'Noise and "dust" monitoring',
  address: '1 Example Street, London',
  submissionDate: '2024-01-15',
  applicationUrl: 'https://planning.example.gov.uk/app/1',
  detectedKeywords: ['noise monitoring', 'dust monitoring'],
  sourceUrl: 'https://planning.example.gov.uk/search',
  scrapedTimestamp: '2024-02-01T09:00:00.000Z'
};

describe('exporter', () => {
  describe('escapeCsv', () => {
    it('should leave plain values alone', () => {
      expect(escapeCsv('Southwark')).toBe('Southwark');
    });

    it('should quote values with commas, quotes or newlines', () => {
      expect(escapeCsv('a,b')).toBe('"a,b"');
      expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsv('line\nbreak')).toBe('"line\nbreak"');
    });
  });

  describe('toCsv', () => {
    it('should write a header and one line per application', () => {
      const csv = toCsv([application, { ...application, projectId: '24/AP/0999', submissionDate: null, detectedKeywords: ['remote monitoring'], title: 'Survey' }]);

      expect(csv.split('\n')).toEqual([
        'Project ID,Borough,Title,Address,Submission Date,Detected Keywords,Application URL,Source URL,Scraped At',
        '24/AP/0234,Southwark,"Noise and ""dust"" monitoring","1 Example Street, London",2024-01-15,"noise monitoring, dust monitoring",https://planning.example.gov.uk/app/1,https://planning.example.gov.uk/search,2024-02-01T09:00:00.000Z',
        '24/AP/0999,Southwark,Survey,"1 Example Street, London",,remote monitoring,https://planning.example.gov.uk/app/1,https://planning.example.gov.uk/search,2024-02-01T09:00:00.000Z',
        ''
      ]);
    });
  });

  describe('exportApplications', () => {
    it('should produce a CSV file', async () => {
      const result = await exportApplications([application], 'csv');

      expect(result.filename).toBe('planning_applications_export.csv');
      expect(result.mimeType).toBe('text/csv');
      expect(result.buffer.toString('utf-8')).toBe(toCsv([application]));
    });

    it('should produce a workbook with a header row and the application', async () => {
      const result = await exportApplications([application], 'xlsx');

      expect(result.filename).toBe('planning_applications_export.xlsx');
      expect(result.mimeType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');

      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.load(result.buffer);
      const sheet = workbook.getWorksheet('Planning Applications');

      expect(sheet?.rowCount).toBe(2);
      expect(sheet?.getRow(1).getCell(1).value).toBe('Project ID');
      expect(sheet?.getRow(2).getCell(1).value).toBe('24/AP/0234');
      expect(sheet?.getRow(2).getCell(6).value).toBe('noise monitoring, dust monitoring');
    });
  });

  it('should recognise supported formats', () => {
    expect(isExportFormat('csv')).toBe(true);
    expect(isExportFormat('xlsx')).toBe(true);
    expect(isExportFormat('pdf')).toBe(false);
  });
});
