import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { InteractionsService } from './interactions.service';
import { InteractionDto } from './dtos/interaction.dto';
import { GRADEBOOK_COMMANDS } from './command-definitions';
import { CommandDefinition, InteractionResponse } from './interfaces/interaction.interface';

@ApiTags('Interactions')
@Controller('interactions')
export class InteractionsController {
  constructor(private readonly interactionsService: InteractionsService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Chat platform interactions endpoint (ping and slash commands)' })
  handle(@Body() interaction: InteractionDto): Promise<InteractionResponse> {
    return this.interactionsService.handle(interaction);
  }

  @Get('commands')
  @ApiOperation({ summary: 'Slash command definitions for registration with the platform' })
  listCommands(): readonly CommandDefinition[] {
    return GRADEBOOK_COMMANDS;
  }
}
