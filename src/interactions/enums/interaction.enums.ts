// Numeric values follow the chat platform's interactions wire format

export enum InteractionType {
  PING = 1,
  APPLICATION_COMMAND = 2,
}

export enum InteractionResponseType {
  PONG = 1,
  CHANNEL_MESSAGE_WITH_SOURCE = 4,
}

export enum CommandOptionType {
  STRING = 3,
  INTEGER = 4,
  NUMBER = 10,
}

export const EPHEMERAL_FLAG = 1 << 6;

export enum GradebookCommand {
  ADD_COURSE = 'add_course',
  ADD_STUDENT = 'add_student',
  SET_GRADE = 'set_grade',
  REPORT_CARD = 'report_card',
}
