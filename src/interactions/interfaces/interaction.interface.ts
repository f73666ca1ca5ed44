import { CommandOptionType, InteractionResponseType } from '../enums/interaction.enums';

export type CommandOptionValue = string | number | boolean;

export interface CommandOption {
  name: string;
  value?: CommandOptionValue;
}

export interface InteractionResponse {
  type: InteractionResponseType;
  data?: {
    content: string;
    flags?: number;
  };
}

export interface CommandOptionDefinition {
  type: CommandOptionType;
  name: string;
  description: string;
  required: boolean;
  min_value?: number;
  max_value?: number;
}

export interface CommandDefinition {
  name: string;
  description: string;
  options: CommandOptionDefinition[];
}
