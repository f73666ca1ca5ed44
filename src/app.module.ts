import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { GradebookModule } from './gradebook/gradebook.module';
import { InteractionsModule } from './interactions/interactions.module';

@Module({
  imports: [
    ConfigModule,
    GradebookModule,
    InteractionsModule,
  ],
})
export class AppModule {}
