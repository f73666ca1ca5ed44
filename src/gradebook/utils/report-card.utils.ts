import { Student } from '../entities/student.entity';

const PLACEHOLDER = '-';
const RULE = '-'.repeat(41);

// Up to two decimals, trailing zeros dropped: 80 -> "80", 82.5 -> "82.5"
export function formatScore(score: number | undefined): string {
  if (score === undefined) return PLACEHOLDER;
  return String(Number(score.toFixed(2)));
}

export function formatAverage(average: number | undefined): string {
  return average === undefined ? PLACEHOLDER : average.toFixed(2);
}

function row(course: string, exam1: string, exam2: string, project: string, average: string, grade: string): string {
  return [
    course.padEnd(10),
    exam1.padStart(5),
    exam2.padStart(5),
    project.padStart(5),
    average.padStart(6),
    grade.padStart(5),
  ].join(' ');
}

/**
 * Fixed-width report card for a monospace display: one row per graded course
 * in the order the records were added, then the overall average.
 */
export function renderReportCard(student: Student): string {
  const lines = [
    `Student: ${student.name} (${student.id})  Class: ${student.className}`,
    RULE,
    row('Course', 'Ex1', 'Ex2', 'Proj', 'Avg', 'Grade'),
  ];

  for (const [courseCode, record] of student.grades) {
    lines.push(
      row(
        courseCode,
        formatScore(record.exam1),
        formatScore(record.exam2),
        formatScore(record.project),
        formatAverage(record.average()),
        record.letterGrade() ?? PLACEHOLDER,
      ),
    );
  }

  lines.push(RULE);
  lines.push(`Overall Average: ${formatAverage(student.overallAverage())}`);
  return lines.join('\n');
}
