export interface GradeRecordView {
  courseCode: string;
  exam1: number | null;
  exam2: number | null;
  project: number | null;
  average: number | null;
  letterGrade: string | null;
}

export interface StudentView {
  id: string;
  name: string;
  className: string;
  grades: GradeRecordView[];
  overallAverage: number | null;
}
