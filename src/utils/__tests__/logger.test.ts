import { consoleFormat, sanitizeLogData } from '../logger';

describe('sanitizeLogData', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(
      sanitizeLogData({
        userId: 'u-1',
        password: 'test-secret',
        database: { host: 'localhost', dbPassword: 'test-secret' },
        authToken: 'test-token'
      })
    ).toEqual({
      userId: 'u-1',
      password: '[REDACTED]',
      database: { host: 'localhost', dbPassword: '[REDACTED]' },
      authToken: '[REDACTED]'
    });
  });

  it('should leave dates and arrays untouched', () => {
    const at = new Date('2024-06-01T12:00:00.000Z');

    expect(sanitizeLogData({ at, ids: ['a', 'b'] })).toEqual({ at, ids: ['a', 'b'] });
  });
});

describe('consoleFormat', () => {
  const stripColours = (line: string) => line.replace(/\u001b\[\d+m/g, '');

  it('should render an upper-case level, message and redacted metadata on one line', () => {
    const result = consoleFormat.transform({
      level: 'info',
      message: 'Ride created',
      rideId: 'r-1',
      token: 'test-token',
      [Symbol.for('level')]: 'info'
    });
    if (typeof result === 'boolean') {
      throw new Error('Expected the format to keep the entry');
    }

    const line = String(Reflect.get(result, Symbol.for('message')));
    expect(stripColours(line)).toMatch(
      /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[INFO\]: Ride created \{"rideId":"r-1","token":"\[REDACTED\]"\}$/
    );
  });
});
