// Shape of the persisted store file. Absent scores are written as null.

export interface CourseData {
  code: string;
  name: string;
  credit: number;
}

export interface GradeRecordData {
  courseCode: string;
  exam1: number | null;
  exam2: number | null;
  project: number | null;
}

export interface StudentData {
  id: string;
  name: string;
  className: string;
  grades: Record<string, GradeRecordData>;
}

export interface GradebookDocument {
  students: Record<string, StudentData>;
  courses: Record<string, CourseData>;
}

export const emptyGradebookDocument = (): GradebookDocument => ({
  students: {},
  courses: {},
});
