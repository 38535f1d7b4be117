import type Database from 'better-sqlite3';
import { withStore } from './database.js';
import type { TrainingSample, TrainingSampleInput } from './types.js';

/**
 * Labeled samples submitted as user feedback, kept for the classifier's
 * training pipeline.
 */
export class FeedbackStore {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date(),
  ) {}

  addTrainingSample(input: TrainingSampleInput): TrainingSample {
    return withStore('record training sample', () => {
      const createdAt = this.now().toISOString();
      const result = this.db.prepare(`
        INSERT INTO model_training_data
          (email_content, email_subject, email_sender, true_label, user_feedback, confidence_score, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        input.emailContent,
        input.emailSubject ?? null,
        input.emailSender ?? null,
        input.trueLabel,
        input.userFeedback ?? null,
        input.confidenceScore ?? null,
        createdAt,
      );
      return { ...input, id: Number(result.lastInsertRowid), createdAt };
    });
  }

  count(): number {
    return withStore('count training samples', () => this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM model_training_data')
      .get()?.count ?? 0);
  }
}
