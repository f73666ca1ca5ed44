import { GradeRecordData } from '../interfaces/gradebook-document.interface';
import { GradeCalculationUtils } from '../utils/grade-calculation.utils';

export type ScoreField = 'exam1' | 'exam2' | 'project';

export const SCORE_FIELDS: readonly ScoreField[] = ['exam1', 'exam2', 'project'];

/** Scores to write; a field left undefined keeps its stored value. */
export type ScoreUpdate = Partial<Record<ScoreField, number>>;

/**
 * Up to three scores for one student in one course. Instances are immutable:
 * {@link GradeRecord.withScores} returns the updated copy.
 */
export class GradeRecord {
  constructor(
    readonly courseCode: string,
    readonly exam1?: number,
    readonly exam2?: number,
    readonly project?: number,
  ) {}

  static fromData(data: GradeRecordData): GradeRecord {
    return new GradeRecord(
      data.courseCode,
      data.exam1 ?? undefined,
      data.exam2 ?? undefined,
      data.project ?? undefined,
    );
  }

  withScores(update: ScoreUpdate): GradeRecord {
    return new GradeRecord(
      this.courseCode,
      update.exam1 ?? this.exam1,
      update.exam2 ?? this.exam2,
      update.project ?? this.project,
    );
  }

  /** Scores that have been entered, in exam1, exam2, project order. */
  presentScores(): number[] {
    return SCORE_FIELDS.map((field) => this[field]).filter(
      (score): score is number => score !== undefined,
    );
  }

  average(): number | undefined {
    return GradeCalculationUtils.mean(this.presentScores());
  }

  letterGrade(): string | undefined {
    const average = this.average();
    return average === undefined ? undefined : GradeCalculationUtils.letterGrade(average);
  }

  toData(): GradeRecordData {
    return {
      courseCode: this.courseCode,
      exam1: this.exam1 ?? null,
      exam2: this.exam2 ?? null,
      project: this.project ?? null,
    };
  }
}
