import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { GradebookService } from '../gradebook/gradebook.service';
import { GradebookPersistenceError } from '../gradebook/errors/gradebook.errors';
import { ScoreUpdate } from '../gradebook/entities/grade-record.entity';
import { CommandOptionError, CommandOptions } from './command-options';
import {
  EPHEMERAL_FLAG,
  GradebookCommand,
  InteractionResponseType,
  InteractionType,
} from './enums/interaction.enums';
import { CommandOption, InteractionResponse } from './interfaces/interaction.interface';
import { InteractionDto } from './dtos/interaction.dto';

/** Score value users type to leave a score blank. */
export const NO_SCORE = -1;
export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export const SCORE_RANGE_MESSAGE = `Scores must be between ${MIN_SCORE} and ${MAX_SCORE} (use ${NO_SCORE} to leave a score blank).`;

export const REPLIES = {
  COURSE_ADDED: '✅ Course added.',
  COURSE_EXISTS: '❗ This course code already exists!',
  STUDENT_ADDED: '✅ Student added.',
  STUDENT_EXISTS: '❗ This student id is already registered!',
  STUDENT_NOT_FOUND: '❗ Student not found.',
  SAVE_FAILED: '❗ The gradebook could not be saved; nothing was changed.',
};

const reply = (content: string, ephemeral = true): InteractionResponse => ({
  type: InteractionResponseType.CHANNEL_MESSAGE_WITH_SOURCE,
  data: ephemeral ? { content, flags: EPHEMERAL_FLAG } : { content },
});

@Injectable()
export class InteractionsService {
  private readonly logger = new Logger(InteractionsService.name);

  constructor(private readonly gradebookService: GradebookService) {}

  async handle(interaction: InteractionDto): Promise<InteractionResponse> {
    switch (interaction.type) {
      case InteractionType.PING:
        return { type: InteractionResponseType.PONG };
      case InteractionType.APPLICATION_COMMAND:
        if (!interaction.data) throw new BadRequestException('Command interaction without data');
        return this.runCommand(interaction.data.name, interaction.data.options);
      default:
        throw new BadRequestException(`Unsupported interaction type ${interaction.type}`);
    }
  }

  async runCommand(name: string, rawOptions?: readonly CommandOption[]): Promise<InteractionResponse> {
    const options = new CommandOptions(rawOptions);
    this.logger.debug(`Running /${name}`);
    try {
      switch (name) {
        case GradebookCommand.ADD_COURSE:
          return await this.addCourse(options);
        case GradebookCommand.ADD_STUDENT:
          return await this.addStudent(options);
        case GradebookCommand.SET_GRADE:
          return await this.setGrade(options);
        case GradebookCommand.REPORT_CARD:
          return this.reportCard(options);
        default:
          return reply(`❗ Unknown command: ${name}`);
      }
    } catch (err) {
      if (err instanceof CommandOptionError) {
        return reply(`❗ ${err.message}`);
      }
      if (err instanceof GradebookPersistenceError) {
        this.logger.error(`/${name} failed: ${err.message}`, err.stack);
        return reply(REPLIES.SAVE_FAILED);
      }
      throw err;
    }
  }

  private async addCourse(options: CommandOptions): Promise<InteractionResponse> {
    const code = options.string('code');
    const name = options.string('name');
    const credit = options.integer('credit', 1);
    if (credit < 1) throw new CommandOptionError('Option credit must be at least 1');

    const added = await this.gradebookService.addCourse(code, name, credit);
    return reply(added ? REPLIES.COURSE_ADDED : REPLIES.COURSE_EXISTS);
  }

  private async addStudent(options: CommandOptions): Promise<InteractionResponse> {
    const added = await this.gradebookService.addStudent(
      options.string('id'),
      options.string('name'),
      options.string('class'),
    );
    return reply(added ? REPLIES.STUDENT_ADDED : REPLIES.STUDENT_EXISTS);
  }

  private async setGrade(options: CommandOptions): Promise<InteractionResponse> {
    const studentId = options.string('id');
    const courseCode = options.string('course_code');
    const scores: ScoreUpdate = {
      exam1: this.score(options, 'exam1'),
      exam2: this.score(options, 'exam2'),
      project: this.score(options, 'project'),
    };
    const status = await this.gradebookService.setGrade(studentId, courseCode, scores);
    return reply(status);
  }

  private reportCard(options: CommandOptions): InteractionResponse {
    const report = this.gradebookService.buildReport(options.string('id'));
    if (report === undefined) return reply(REPLIES.STUDENT_NOT_FOUND);
    // Code block keeps the columns aligned in the chat client
    return reply(`\`\`\`\n${report}\n\`\`\``, false);
  }

  // The blank-score sentinel stops here; the gradebook only sees present or absent scores
  private score(options: CommandOptions, name: string): number | undefined {
    const value = options.number(name);
    if (value === NO_SCORE) return undefined;
    if (value < MIN_SCORE || value > MAX_SCORE) {
      throw new CommandOptionError(SCORE_RANGE_MESSAGE);
    }
    return value;
  }
}
