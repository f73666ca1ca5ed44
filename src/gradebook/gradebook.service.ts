// src/gradebook/gradebook.service.ts
import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { Course, DEFAULT_COURSE_CREDIT } from './entities/course.entity';
import { GradeRecord, ScoreUpdate } from './entities/grade-record.entity';
import { Student } from './entities/student.entity';
import { GradeEntryStatus } from './enums/grade-entry-status.enum';
import { InvalidCourseCreditError } from './errors/gradebook.errors';
import { GradebookDocument } from './interfaces/gradebook-document.interface';
import { GRADEBOOK_REPOSITORY, GradebookRepository } from './repository/gradebook.repository';
import { renderReportCard } from './utils/report-card.utils';

/**
 * Owns every course and student. Each mutation is written through to the
 * repository before it is applied in memory, so a failed save leaves the
 * in-memory state untouched and the error reaches the caller.
 */
@Injectable()
export class GradebookService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(GradebookService.name);
  private readonly courses = new Map<string, Course>();
  private readonly students = new Map<string, Student>();
  // Tail of the mutation queue; mutations run one at a time
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    @Inject(GRADEBOOK_REPOSITORY)
    private readonly repository: GradebookRepository,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  // Lets an in-flight write finish before the process exits
  async onApplicationShutdown(): Promise<void> {
    await this.pending;
  }

  async load(): Promise<void> {
    const document = await this.repository.load();
    this.courses.clear();
    this.students.clear();
    for (const data of Object.values(document.courses)) {
      const course = Course.fromData(data);
      this.courses.set(course.code, course);
    }
    for (const data of Object.values(document.students)) {
      this.students.set(data.id, Student.fromData(data));
    }
    this.logger.log(`Loaded ${this.courses.size} courses and ${this.students.size} students`);
  }

  async addCourse(code: string, name: string, credit: number = DEFAULT_COURSE_CREDIT): Promise<boolean> {
    return this.exclusive(async () => {
      if (!Course.isValidCredit(credit)) throw new InvalidCourseCreditError(credit);
      const course = new Course(code, name, credit);
      if (this.courses.has(course.code)) {
        this.logger.warn(`Course ${course.code} already exists`);
        return false;
      }

      const document = this.toDocument();
      document.courses[course.code] = course.toData();
      await this.persist(document);

      this.courses.set(course.code, course);
      this.logger.log(`Course ${course.code} added`);
      return true;
    });
  }

  async addStudent(id: string, name: string, className: string): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.students.has(id)) {
        this.logger.warn(`Student ${id} already exists`);
        return false;
      }

      const student = new Student(id, name, className);
      const document = this.toDocument();
      document.students[id] = student.toData();
      await this.persist(document);

      this.students.set(id, student);
      this.logger.log(`Student ${id} added`);
      return true;
    });
  }

  /**
   * Upserts the student's record for a course. Only the scores present in
   * `scores` are written; the others keep their stored values.
   */
  async setGrade(studentId: string, courseCode: string, scores: ScoreUpdate = {}): Promise<GradeEntryStatus> {
    return this.exclusive(async () => {
      const code = Course.canonicalCode(courseCode);
      const student = this.students.get(studentId);
      if (!student) {
        this.logger.warn(`Grade entry for unknown student ${studentId}`);
        return GradeEntryStatus.STUDENT_NOT_FOUND;
      }
      if (!this.courses.has(code)) {
        this.logger.warn(`Grade entry for unknown course ${code}`);
        return GradeEntryStatus.COURSE_NOT_FOUND;
      }
      // NaN and Infinity would not survive the JSON write
      if (Object.values(scores).some((score) => score !== undefined && !Number.isFinite(score))) {
        this.logger.warn(`Rejected non-finite score for student ${studentId} in ${code}`);
        return GradeEntryStatus.INVALID_SCORE;
      }

      const current = student.gradeFor(code) ?? new GradeRecord(code);
      const updated = current.withScores(scores);
      const document = this.toDocument();
      document.students[studentId].grades[code] = updated.toData();
      await this.persist(document);

      student.putGrade(updated);
      this.logger.log(`Grades for student ${studentId} in ${code} updated`);
      return GradeEntryStatus.UPDATED;
    });
  }

  /** Fixed-width report card, or undefined when the student is unknown. */
  buildReport(studentId: string): string | undefined {
    const student = this.students.get(studentId);
    return student ? renderReportCard(student) : undefined;
  }

  findStudent(studentId: string): Student | undefined {
    return this.students.get(studentId);
  }

  findCourse(code: string): Course | undefined {
    return this.courses.get(Course.canonicalCode(code));
  }

  listCourses(): Course[] {
    return Array.from(this.courses.values());
  }

  toDocument(): GradebookDocument {
    const document: GradebookDocument = { students: {}, courses: {} };
    for (const [id, student] of this.students) {
      document.students[id] = student.toData();
    }
    for (const [code, course] of this.courses) {
      document.courses[code] = course.toData();
    }
    return document;
  }

  private async persist(document: GradebookDocument): Promise<void> {
    try {
      await this.repository.save(document);
    } catch (err) {
      this.logger.error('Failed to persist gradebook', err instanceof Error ? err.stack : String(err));
      throw err;
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    // A failed task must not stall the queue; its error still reaches the caller through `run`
    this.pending = run.catch(() => undefined);
    return run;
  }
}
