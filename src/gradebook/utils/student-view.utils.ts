import { Student } from '../entities/student.entity';
import { GradeRecordView, StudentView } from '../interfaces/student-view.interface';

export function toStudentView(student: Student): StudentView {
  const grades: GradeRecordView[] = Array.from(student.grades.values(), (record) => ({
    ...record.toData(),
    average: record.average() ?? null,
    letterGrade: record.letterGrade() ?? null,
  }));
  return {
    id: student.id,
    name: student.name,
    className: student.className,
    grades,
    overallAverage: student.overallAverage() ?? null,
  };
}
