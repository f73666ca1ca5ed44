import { CourseData } from '../interfaces/gradebook-document.interface';

export const DEFAULT_COURSE_CREDIT = 1;

export class Course {
  readonly code: string;

  constructor(
    code: string,
    readonly name: string,
    readonly credit: number = DEFAULT_COURSE_CREDIT,
  ) {
    this.code = Course.canonicalCode(code);
  }

  // Course codes are unique case-insensitively and stored uppercase
  static canonicalCode(code: string): string {
    return code.toUpperCase();
  }

  static isValidCredit(credit: number): boolean {
    return Number.isInteger(credit) && credit >= 1;
  }

  static fromData(data: CourseData): Course {
    return new Course(data.code, data.name, data.credit);
  }

  toData(): CourseData {
    return { code: this.code, name: this.name, credit: this.credit };
  }
}
