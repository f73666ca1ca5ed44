import { StudentData, GradeRecordData } from '../interfaces/gradebook-document.interface';
import { GradeCalculationUtils } from '../utils/grade-calculation.utils';
import { GradeRecord } from './grade-record.entity';

export class Student {
  // Keyed by uppercase course code, in the order the records were first added
  private readonly records: Map<string, GradeRecord>;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly className: string,
    records: Iterable<GradeRecord> = [],
  ) {
    this.records = new Map(Array.from(records, (r) => [r.courseCode, r] as const));
  }

  static fromData(data: StudentData): Student {
    return new Student(
      data.id,
      data.name,
      data.className,
      Object.values(data.grades).map((record) => GradeRecord.fromData(record)),
    );
  }

  get grades(): ReadonlyMap<string, GradeRecord> {
    return this.records;
  }

  gradeFor(courseCode: string): GradeRecord | undefined {
    return this.records.get(courseCode);
  }

  /** Replaces the record for its course; a new course is appended. */
  putGrade(record: GradeRecord): void {
    this.records.set(record.courseCode, record);
  }

  overallAverage(): number | undefined {
    const averages = Array.from(this.records.values())
      .map((record) => record.average())
      .filter((average): average is number => average !== undefined);
    return GradeCalculationUtils.mean(averages);
  }

  toData(): StudentData {
    const grades: Record<string, GradeRecordData> = {};
    for (const [code, record] of this.records) {
      grades[code] = record.toData();
    }
    return { id: this.id, name: this.name, className: this.className, grades };
  }
}
