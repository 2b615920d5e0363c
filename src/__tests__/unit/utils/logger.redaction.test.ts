import { currentLevel, logger, redactObject, redactValue } from '../../../utils/logger';

describe('logger redaction', () => {
  it('redacts student identifiers and credentials', () => {
    const redacted = redactObject({
      student_name: 'Test Student',
      Student_Number: '1001',
      password: 'test-secret',
      nested: { studentName: 'Other Student', kind: 'unparseable_time' },
      kind: 'unparseable_date',
    });

    expect(redacted).toEqual({
      student_name: '[REDACTED]',
      Student_Number: '[REDACTED]',
      password: '[REDACTED]',
      nested: { studentName: '[REDACTED]', kind: 'unparseable_time' },
      kind: 'unparseable_date',
    });
  });

  it('masks bearer tokens and email-shaped values', () => {
    expect(redactValue('Bearer token-here')).toBe('Bearer [REDACTED]');
    expect(redactValue('staff@example.org')).toBe('[REDACTED_EMAIL]');
    expect(redactValue('Hallway')).toBe('Hallway');
  });
});

describe('logger levels', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = original;
  });

  it('defaults to info for unknown levels', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(currentLevel()).toBe('info');
  });

  it('writes single-line JSON at warn', () => {
    process.env.LOG_LEVEL = 'info';
    logger.warn('Incident data-quality issue', { field: 'incident_time', value: 'noon' });

    expect(console.warn).toHaveBeenCalledTimes(1);
    const line = String(jest.mocked(console.warn).mock.calls[0][0]);
    expect(JSON.parse(line)).toMatchObject({
      level: 'warn',
      msg: 'Incident data-quality issue',
      field: 'incident_time',
      value: 'noon',
    });
  });

  it('drops messages below the configured level', () => {
    process.env.LOG_LEVEL = 'error';
    logger.info('Discipline reports published');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('writes nothing when silent', () => {
    process.env.LOG_LEVEL = 'silent';
    logger.error('Report sink rejected report');
    expect(console.error).not.toHaveBeenCalled();
  });
});
