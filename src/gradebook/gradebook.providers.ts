import { ConfigService } from '../config/config.service';
import { DEFAULT_DATA_FILE } from '../common/constants/constants';
import { GRADEBOOK_REPOSITORY } from './repository/gradebook.repository';
import { JsonFileGradebookRepository } from './repository/json-file-gradebook.repository';

export const gradebookProviders = [
  {
    provide: GRADEBOOK_REPOSITORY,
    useFactory: (configService: ConfigService) =>
      new JsonFileGradebookRepository(configService.get('DATA_FILE', DEFAULT_DATA_FILE)),
    inject: [ConfigService],
  },
];
