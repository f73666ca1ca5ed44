import { Module } from '@nestjs/common';
import { GradebookService } from './gradebook.service';
import { GradebookController } from './gradebook.controller';
import { gradebookProviders } from './gradebook.providers';

@Module({
  providers: [...gradebookProviders, GradebookService],
  controllers: [GradebookController],
  exports: [GradebookService],
})
export class GradebookModule {}
