import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { INestApplicationContext } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AppModule } from '../src/app.module';
import { ConfigService } from '../src/config/config.service';
import { GradebookService } from '../src/gradebook/gradebook.service';
import { InteractionsService } from '../src/interactions/interactions.service';

describe('Gradebook (file-backed, through slash commands)', () => {
  let dir: string;
  let dataFile: string;
  let envFile: string;

  const boot = async (): Promise<INestApplicationContext> => {
    const module = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(ConfigService)
      .useValue(new ConfigService(envFile))
      .compile();
    return module.init();
  };

  const run = (app: INestApplicationContext, name: string, options: Record<string, string | number>) =>
    app.get(InteractionsService).runCommand(
      name,
      Object.entries(options).map(([optionName, value]) => ({ name: optionName, value })),
    );

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gradebook-it-'));
    dataFile = path.join(dir, 'store', 'gradebook.json');
    envFile = path.join(dir, '.env.test');
    fs.writeFileSync(envFile, `DATA_FILE=${dataFile}\n`);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes every change through and reloads it on the next start', async () => {
    const app = await boot();
    await run(app, 'add_course', { code: 'mat101', name: 'Mathematics', credit: 4 });
    await run(app, 'add_course', { code: 'PHY101', name: 'Physics' });
    await run(app, 'add_student', { id: '1024', name: 'Jane Doe', class: '10-A' });
    await run(app, 'set_grade', { id: '1024', course_code: 'mat101', exam1: 70, exam2: -1, project: -1 });
    await run(app, 'set_grade', { id: '1024', course_code: 'phy101', exam1: 90, exam2: -1, project: -1 });
    const report = app.get(GradebookService).buildReport('1024');
    await app.close();

    const stored = JSON.parse(fs.readFileSync(dataFile, 'utf8'));
    expect(stored).toEqual({
      students: {
        '1024': {
          id: '1024',
          name: 'Jane Doe',
          className: '10-A',
          grades: {
            MAT101: { courseCode: 'MAT101', exam1: 70, exam2: null, project: null },
            PHY101: { courseCode: 'PHY101', exam1: 90, exam2: null, project: null },
          },
        },
      },
      courses: {
        MAT101: { code: 'MAT101', name: 'Mathematics', credit: 4 },
        PHY101: { code: 'PHY101', name: 'Physics', credit: 1 },
      },
    });

    const restarted = await boot();
    expect(restarted.get(GradebookService).buildReport('1024')).toBe(report);
    expect(report?.split('\n').pop()).toBe('Overall Average: 80.00');

    const reply = await run(restarted, 'add_student', { id: '1024', name: 'Jane Doe', class: '10-A' });
    expect(reply.data?.content).toBe('❗ This student id is already registered!');
    await restarted.close();
  });
});
