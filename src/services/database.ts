import { createClient, SupabaseClient } from '@supabase/supabase-js';
import {
  ApplicationQuery,
  ApplicationRecord,
  ApplicationStore,
  InsertCounts,
  PlanningApplication,
  ScrapeLogRecord,
  ScrapeSession,
  StoreStatistics
} from '../types/planning';

// PostgREST caps a response at its max-rows setting (1000 on Supabase)
export const PAGE_SIZE = 1000;

interface PageResponse<T> {
  data: T[] | null;
  error: { message: string } | null;
}

/**
 * Read every row of a query, one range at a time, until a short page comes back
 */
async function fetchAllPages<T>(
  fetchPage: (from: number, to: number) => PromiseLike<PageResponse<T>>,
  failure: string
): Promise<T[]> {
  const rows: T[] = [];

  for (let from = 0; ; from += PAGE_SIZE) {
    const { data, error } = await fetchPage(from, from + PAGE_SIZE - 1);
    if (error) {
      throw new Error(`${failure}: ${error.message}`);
    }

    const page = data ?? [];
    rows.push(...page);
    if (page.length < PAGE_SIZE) {
      return rows;
    }
  }
}

export interface DatabaseOptions {
  url?: string;
  serviceRoleKey?: string;
}

interface StatisticsRow {
  borough: string;
  detected_keywords: string[] | null;
}

interface LastScrapeRow {
  borough: string;
  scraped_at: string;
}

export function toApplicationRecord(application: PlanningApplication): Omit<ApplicationRecord, 'id' | 'created_at'> {
  return {
    project_id: application.projectId,
    borough: application.borough,
    title: application.title || null,
    address: application.address || null,
    submission_date: application.submissionDate,
    application_url: application.applicationUrl || null,
    detected_keywords: application.detectedKeywords,
    source_url: application.sourceUrl || null,
    scraped_timestamp: application.scrapedTimestamp
  };
}

export function fromApplicationRecord(record: ApplicationRecord): PlanningApplication {
  return {
    projectId: record.project_id,
    borough: record.borough,
    title: record.title ?? '',
    address: record.address ?? '',
    submissionDate: record.submission_date,
    applicationUrl: record.application_url ?? '',
    detectedKeywords: record.detected_keywords ?? [],
    sourceUrl: record.source_url ?? '',
    scrapedTimestamp: record.scraped_timestamp
  };
}

/**
 * Database service for planning applications and scrape logs in Supabase
 */
export class DatabaseService implements ApplicationStore {
  private supabase: SupabaseClient;

  constructor(options: DatabaseOptions = {}) {
    const supabaseUrl = options.url ?? process.env.SUPABASE_URL;
    const supabaseServiceKey = options.serviceRoleKey ?? process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!supabaseUrl || !supabaseServiceKey) {
      throw new Error('Missing required Supabase environment variables');
    }

    this.supabase = createClient(supabaseUrl, supabaseServiceKey);
    console.log('Database service initialized with Supabase');
  }

  /**
   * Insert one application unless (project_id, borough) already exists
   */
  async insertOrIgnore(application: PlanningApplication): Promise<boolean> {
    const counts = await this.bulkInsert([application]);
    return counts.new > 0;
  }

  /**
   * Insert applications, ignoring rows that already exist; reports how many were new
   */
  async bulkInsert(applications: PlanningApplication[]): Promise<InsertCounts> {
    if (applications.length === 0) {
      return { total: 0, new: 0 };
    }

    const records = applications.map(toApplicationRecord);

    const { data, error } = await this.supabase
      .from('planning_applications')
      .upsert(records, {
        onConflict: 'project_id,borough',
        ignoreDuplicates: true
      })
      .select('project_id');

    if (error) {
      throw new Error(`Failed to insert applications: ${error.message}`);
    }

    const inserted = data ? data.length : 0;
    console.log(`Inserted ${inserted} new of ${records.length} applications`);
    return { total: records.length, new: inserted };
  }

  /**
   * Log scraping session results
   */
  async logSession(session: ScrapeSession): Promise<void> {
    const record: Omit<ScrapeLogRecord, 'id'> = {
      borough: session.borough,
      keywords: session.keywords,
      started_at: session.startedAt,
      scraped_at: session.completedAt,
      records_found: session.recordsFound,
      records_new: session.recordsNew,
      requests_made: session.requestsMade,
      status: session.status,
      error_message: session.errorMessage ?? null
    };

    const { error } = await this.supabase
      .from('scraping_logs')
      .insert(record);

    if (error) {
      throw new Error(`Failed to log scrape session: ${error.message}`);
    }

    console.log(`Logged scrape session for ${session.borough}: ${session.status} - ${session.recordsFound} found, ${session.recordsNew} new`);
  }

  /**
   * Stored applications matching the filters, newest submission first
   */
  async query(filters: ApplicationQuery = {}): Promise<PlanningApplication[]> {
    const records = await fetchAllPages<ApplicationRecord>((from, to) => {
      let request = this.supabase
        .from('planning_applications')
        .select('*');

      if (filters.borough) {
        request = request.eq('borough', filters.borough);
      }
      if (filters.keyword) {
        request = request.contains('detected_keywords', [filters.keyword]);
      }
      if (filters.dateFrom) {
        request = request.gte('submission_date', filters.dateFrom);
      }
      if (filters.dateTo) {
        request = request.lte('submission_date', filters.dateTo);
      }

      return request
        .order('submission_date', { ascending: false, nullsFirst: false })
        .order('id', { ascending: true })
        .range(from, to);
    }, 'Failed to query applications');

    return records.map(fromApplicationRecord);
  }

  /**
   * Totals by borough and keyword, plus the latest scrape time per borough
   */
  async statistics(): Promise<StoreStatistics> {
    const rows = await fetchAllPages<StatisticsRow>((from, to) =>
      this.supabase
        .from('planning_applications')
        .select('borough, detected_keywords')
        .order('id', { ascending: true })
        .range(from, to),
      'Failed to fetch statistics'
    );

    const byBorough: Record<string, number> = {};
    const byKeyword: Record<string, number> = {};

    for (const row of rows) {
      byBorough[row.borough] = (byBorough[row.borough] ?? 0) + 1;
      for (const keyword of row.detected_keywords ?? []) {
        byKeyword[keyword] = (byKeyword[keyword] ?? 0) + 1;
      }
    }

    const logRows = await fetchAllPages<LastScrapeRow>((from, to) =>
      this.supabase
        .from('scraping_logs')
        .select('borough, scraped_at')
        .order('scraped_at', { ascending: false })
        .range(from, to),
      'Failed to fetch scrape history'
    );

    const lastScrapes: Record<string, string> = {};
    for (const log of logRows) {
      if (!(log.borough in lastScrapes)) {
        lastScrapes[log.borough] = log.scraped_at;
      }
    }

    return {
      totalApplications: rows.length,
      byBorough,
      byKeyword,
      lastScrapes
    };
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const { error } = await this.supabase
        .from('planning_applications')
        .select('id')
        .limit(1);

      if (error) {
        console.error('Database connection test failed:', error.message);
        return false;
      }

      console.log('Database connection test successful');
      return true;
    } catch (error) {
      console.error('Database connection test failed:', error);
      return false;
    }
  }
}
