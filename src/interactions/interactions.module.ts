import { Module } from '@nestjs/common';
import { GradebookModule } from '../gradebook/gradebook.module';
import { InteractionsController } from './interactions.controller';
import { InteractionsService } from './interactions.service';

@Module({
  imports: [GradebookModule],
  providers: [InteractionsService],
  controllers: [InteractionsController],
})
export class InteractionsModule {}
