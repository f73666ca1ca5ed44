import { CommandOptionType, GradebookCommand } from './enums/interaction.enums';
import { CommandDefinition } from './interfaces/interaction.interface';

// -1 is accepted as "leave this score blank"
const scoreOption = (name: string, label: string) => ({
  type: CommandOptionType.NUMBER,
  name,
  description: `${label} (-1 to leave blank)`,
  required: true,
  min_value: -1,
  max_value: 100,
});

export const GRADEBOOK_COMMANDS: readonly CommandDefinition[] = [
  {
    name: GradebookCommand.ADD_COURSE,
    description: 'Add a new course',
    options: [
      { type: CommandOptionType.STRING, name: 'code', description: 'Course code (e.g. MAT101)', required: true },
      { type: CommandOptionType.STRING, name: 'name', description: 'Course name', required: true },
      { type: CommandOptionType.INTEGER, name: 'credit', description: 'Credit (default 1)', required: false, min_value: 1 },
    ],
  },
  {
    name: GradebookCommand.ADD_STUDENT,
    description: 'Add a new student',
    options: [
      { type: CommandOptionType.STRING, name: 'id', description: 'Student number', required: true },
      { type: CommandOptionType.STRING, name: 'name', description: 'Full name', required: true },
      { type: CommandOptionType.STRING, name: 'class', description: 'Class (e.g. 10-A)', required: true },
    ],
  },
  {
    name: GradebookCommand.SET_GRADE,
    description: 'Enter or update grades',
    options: [
      { type: CommandOptionType.STRING, name: 'id', description: 'Student number', required: true },
      { type: CommandOptionType.STRING, name: 'course_code', description: 'Course code (e.g. MAT101)', required: true },
      scoreOption('exam1', 'Exam 1'),
      scoreOption('exam2', 'Exam 2'),
      scoreOption('project', 'Project'),
    ],
  },
  {
    name: GradebookCommand.REPORT_CARD,
    description: "Show a student's report card",
    options: [
      { type: CommandOptionType.STRING, name: 'id', description: 'Student number', required: true },
    ],
  },
];
