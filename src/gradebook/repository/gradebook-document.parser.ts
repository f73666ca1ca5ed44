import {
  CourseData,
  GradebookDocument,
  GradeRecordData,
  StudentData,
} from '../interfaces/gradebook-document.interface';
import { Course } from '../entities/course.entity';

export class DocumentShapeError extends Error {}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new DocumentShapeError(`${path} must be an object`);
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') throw new DocumentShapeError(`${path} must be a string`);
  return value;
}

function optionalScore(value: unknown, path: string): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DocumentShapeError(`${path} must be a number or null`);
  }
  return value;
}

function parseCourse(key: string, raw: unknown): CourseData {
  const path = `courses.${key}`;
  const course = expectObject(raw, path);
  const credit = course.credit ?? 1;
  if (typeof credit !== 'number' || !Course.isValidCredit(credit)) {
    throw new DocumentShapeError(`${path}.credit must be a positive integer`);
  }
  return {
    code: expectString(course.code ?? key, `${path}.code`),
    name: expectString(course.name, `${path}.name`),
    credit,
  };
}

// Records written without courseCode take it from their key
function parseGradeRecord(path: string, key: string, raw: unknown): GradeRecordData {
  const record = expectObject(raw, path);
  return {
    courseCode: expectString(record.courseCode ?? key, `${path}.courseCode`),
    exam1: optionalScore(record.exam1, `${path}.exam1`),
    exam2: optionalScore(record.exam2, `${path}.exam2`),
    project: optionalScore(record.project, `${path}.project`),
  };
}

function parseStudent(key: string, raw: unknown): StudentData {
  const path = `students.${key}`;
  const student = expectObject(raw, path);
  const grades: Record<string, GradeRecordData> = {};
  for (const [code, record] of Object.entries(expectObject(student.grades ?? {}, `${path}.grades`))) {
    grades[code] = parseGradeRecord(`${path}.grades.${code}`, code, record);
  }
  return {
    id: expectString(student.id ?? key, `${path}.id`),
    name: expectString(student.name, `${path}.name`),
    className: expectString(student.className, `${path}.className`),
    grades,
  };
}

/**
 * Validates a decoded JSON value against the gradebook document shape.
 * Missing score fields are read as null.
 */
export function parseGradebookDocument(raw: unknown): GradebookDocument {
  const root = expectObject(raw, 'document');
  const document: GradebookDocument = { students: {}, courses: {} };

  for (const [key, value] of Object.entries(expectObject(root.students ?? {}, 'students'))) {
    document.students[key] = parseStudent(key, value);
  }
  for (const [key, value] of Object.entries(expectObject(root.courses ?? {}, 'courses'))) {
    document.courses[key] = parseCourse(key, value);
  }
  return document;
}
