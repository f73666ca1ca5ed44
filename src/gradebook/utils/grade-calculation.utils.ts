// src/gradebook/utils/grade-calculation.utils.ts

export interface LetterGradeBand {
  grade: string;
  minAverage: number;
}

// Ordered from the highest band down; each band is inclusive on its lower bound.
export const LETTER_GRADE_BANDS: readonly LetterGradeBand[] = [
  { grade: 'AA', minAverage: 90 },
  { grade: 'BA', minAverage: 85 },
  { grade: 'BB', minAverage: 80 },
  { grade: 'CB', minAverage: 70 },
  { grade: 'CC', minAverage: 60 },
  { grade: 'DC', minAverage: 50 },
  { grade: 'DD', minAverage: 40 },
];

export const FAILING_GRADE = 'FF';

export class GradeCalculationUtils {
  /**
   * Arithmetic mean of the given values
   * @returns undefined when there is nothing to average
   */
  static mean(values: readonly number[]): number | undefined {
    if (values.length === 0) return undefined;
    const total = values.reduce((sum, value) => sum + value, 0);
    return total / values.length;
  }

  /**
   * Maps an average onto the letter grade scale
   * @param average - Any real number; values below every band fail
   */
  static letterGrade(average: number): string {
    const band = LETTER_GRADE_BANDS.find((b) => average >= b.minAverage);
    return band ? band.grade : FAILING_GRADE;
  }
}
