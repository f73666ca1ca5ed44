export enum GradeEntryStatus {
  UPDATED = 'Grades updated.',
  STUDENT_NOT_FOUND = 'Student not found.',
  COURSE_NOT_FOUND = 'Course not found.',
  INVALID_SCORE = 'Scores must be finite numbers.',
}
