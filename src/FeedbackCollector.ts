import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { ConfigManager } from './ConfigManager';
import { FeedbackError, isNotFound } from './errors';
import { WithLogging } from './WithLogging';

const feedbackSchema = z.object({
  query: z.string(),
  response: z.string(),
  rating: z.number().int().min(1).max(5).nullable().default(null),
  metadata: z.record(z.unknown()).optional(),
});

const storedEntrySchema = z
  .object({ rating: z.number().nullable().optional() })
  .passthrough();

export type FeedbackInput = z.input<typeof feedbackSchema>;

export interface FeedbackStats {
  totalQueries: number;
  ratedQueries: number;
  averageRating: number | null;
}

export interface FeedbackCollectorOptions {
  configManager: ConfigManager;
  now?: () => Date;
}

/**
 * Appends query/response pairs and their ratings to a JSON Lines log
 */
export class FeedbackCollector extends WithLogging {
  protected readonly componentName = 'FeedbackCollector';
  protected readonly configManager: ConfigManager;
  private readonly now: () => Date;

  constructor(options: FeedbackCollectorOptions) {
    super();
    this.configManager = options.configManager;
    this.now = options.now ?? (() => new Date());
  }

  get logPath(): string {
    return this.configManager.get('feedbackLogPath');
  }

  /**
   * @throws FeedbackError if the rating is not an integer from 1 to 5
   */
  async logFeedback(input: FeedbackInput): Promise<void> {
    const parsed = feedbackSchema.safeParse(input);
    if (!parsed.success) {
      throw new FeedbackError(
        'Invalid feedback',
        parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
      );
    }
    const { query, response, rating, metadata } = parsed.data;

    // Metadata cannot shadow the core fields
    const entry = {
      ...metadata,
      timestamp: this.now().toISOString(),
      query,
      response,
      rating,
    };
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.appendFile(this.logPath, `${JSON.stringify(entry)}\n`, 'utf-8');
    this.verbose(`Logged feedback${rating === null ? '' : ` (rating ${rating})`}`);
  }

  async getStats(): Promise<FeedbackStats> {
    let raw: string;
    try {
      raw = await fs.readFile(this.logPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return { totalQueries: 0, ratedQueries: 0, averageRating: null };
      }
      throw error;
    }

    let totalQueries = 0;
    let ratedQueries = 0;
    let totalRating = 0;
    raw.split('\n').forEach((line, i) => {
      if (!line.trim()) {
        return;
      }
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        this.warn(`Ignoring malformed feedback line ${i + 1}`);
        return;
      }
      const entry = storedEntrySchema.safeParse(json);
      if (!entry.success) {
        this.warn(`Ignoring malformed feedback line ${i + 1}`);
        return;
      }
      totalQueries++;
      if (typeof entry.data.rating === 'number') {
        ratedQueries++;
        totalRating += entry.data.rating;
      }
    });

    return {
      totalQueries,
      ratedQueries,
      averageRating: ratedQueries > 0 ? totalRating / ratedQueries : null,
    };
  }
}
