import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CreateStudentDto {
  @ApiProperty({ example: '1024' })
  @IsString()
  @IsNotEmpty()
  id!: string;

  @ApiProperty({ example: 'Jane Doe' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ example: '10-A' })
  @IsString()
  @IsNotEmpty()
  className!: string;
}
