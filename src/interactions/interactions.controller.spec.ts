import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { InteractionsController } from './interactions.controller';
import { InteractionDto } from './dtos/interaction.dto';
import { GradebookCommand } from './enums/interaction.enums';

describe('InteractionsController', () => {
  const interactionsService: any = { handle: jest.fn() };
  const controller = new InteractionsController(interactionsService);
  const pipe = new ValidationPipe({ transform: true, whitelist: true });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('lists a definition for every command', () => {
    expect(controller.listCommands().map((c) => c.name)).toEqual([
      GradebookCommand.ADD_COURSE,
      GradebookCommand.ADD_STUDENT,
      GradebookCommand.SET_GRADE,
      GradebookCommand.REPORT_CARD,
    ]);
  });

  it('declares every set_grade score as required and allows the blank sentinel', () => {
    const setGrade = controller.listCommands().find((c) => c.name === GradebookCommand.SET_GRADE);
    const scores = setGrade?.options.filter((o) => ['exam1', 'exam2', 'project'].includes(o.name));
    expect(scores).toHaveLength(3);
    scores?.forEach((option) => {
      expect(option).toEqual(expect.objectContaining({ required: true, min_value: -1, max_value: 100 }));
    });
  });

  it('passes the interaction to the service', async () => {
    interactionsService.handle.mockResolvedValueOnce({ type: 1 });
    await expect(controller.handle({ type: 1 })).resolves.toEqual({ type: 1 });
    expect(interactionsService.handle).toHaveBeenCalledWith({ type: 1 });
  });

  describe('payload validation', () => {
    it('keeps command data and strips platform fields', async () => {
      const payload = {
        type: 2,
        id: 'interaction-1',
        token: 'test-token',
        data: {
          name: 'report_card',
          id: 'command-1',
          options: [{ name: 'id', type: 3, value: '1024' }],
        },
      };

      const dto: InteractionDto = await pipe.transform(payload, { type: 'body', metatype: InteractionDto });
      expect(dto).toBeInstanceOf(InteractionDto);
      expect(JSON.parse(JSON.stringify(dto))).toEqual({
        type: 2,
        data: { name: 'report_card', options: [{ name: 'id', type: 3, value: '1024' }] },
      });
    });

    it('rejects a payload without a numeric type', async () => {
      await expect(
        pipe.transform({ type: 'ping' }, { type: 'body', metatype: InteractionDto }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('rejects options without a name', async () => {
      const payload = { type: 2, data: { name: 'report_card', options: [{ value: '1024' }] } };
      await expect(
        pipe.transform(payload, { type: 'body', metatype: InteractionDto }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });
});
