import { Type } from 'class-transformer';
import {
  Allow,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { CommandOptionValue } from '../interfaces/interaction.interface';

export class InteractionOptionDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsInt()
  type?: number;

  @Allow()
  value?: CommandOptionValue;
}

export class InteractionDataDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InteractionOptionDto)
  options?: InteractionOptionDto[];
}

// Fields the platform sends beyond these (ids, tokens, member) are stripped by the global pipe
export class InteractionDto {
  @IsInt()
  type!: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => InteractionDataDto)
  data?: InteractionDataDto;
}
