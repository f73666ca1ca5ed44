import { GradeRecord } from './grade-record.entity';

describe('GradeRecord', () => {
  it('averages all three scores', () => {
    const record = new GradeRecord('MAT101', 80, 90, 100);
    expect(record.average()).toBe(90);
    expect(record.letterGrade()).toBe('AA');
  });

  it('averages only the scores that are present', () => {
    const record = new GradeRecord('MAT101', 65);
    expect(record.presentScores()).toEqual([65]);
    expect(record.average()).toBe(65);
    expect(record.letterGrade()).toBe('CC');
  });

  it('has no average or letter grade without scores', () => {
    const record = new GradeRecord('MAT101');
    expect(record.average()).toBeUndefined();
    expect(record.letterGrade()).toBeUndefined();
  });

  it('counts a score of zero as present', () => {
    const record = new GradeRecord('MAT101', 0, 80);
    expect(record.average()).toBe(40);
    expect(record.letterGrade()).toBe('DD');
  });

  describe('withScores', () => {
    it('keeps scores that are not supplied', () => {
      const updated = new GradeRecord('MAT101', 80).withScores({ exam2: 90 });
      expect(updated).toEqual(new GradeRecord('MAT101', 80, 90, undefined));
    });

    it('overwrites supplied scores and leaves the original untouched', () => {
      const original = new GradeRecord('MAT101', 80, 70, 60);
      const updated = original.withScores({ exam1: 55, project: 100 });
      expect(updated.toData()).toEqual({ courseCode: 'MAT101', exam1: 55, exam2: 70, project: 100 });
      expect(original.toData()).toEqual({ courseCode: 'MAT101', exam1: 80, exam2: 70, project: 60 });
    });

    it('treats an explicitly undefined score as not supplied', () => {
      const updated = new GradeRecord('MAT101', 80).withScores({ exam1: undefined, exam2: 75 });
      expect(updated.exam1).toBe(80);
      expect(updated.exam2).toBe(75);
    });
  });

  it('writes absent scores as null and reads them back as undefined', () => {
    const data = new GradeRecord('PHY101', undefined, 72.5).toData();
    expect(data).toEqual({ courseCode: 'PHY101', exam1: null, exam2: 72.5, project: null });

    const restored = GradeRecord.fromData(data);
    expect(restored.exam1).toBeUndefined();
    expect(restored.exam2).toBe(72.5);
    expect(restored.project).toBeUndefined();
  });
});
