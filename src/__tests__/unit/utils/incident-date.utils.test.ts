import { parseIncidentDate } from '../../../utils/incident-date.utils';

describe('parseIncidentDate', () => {
  it('parses slash-separated dates', () => {
    expect(parseIncidentDate('03/04/2024')).toEqual({
      status: 'parsed',
      date: { key: '03/04/2024', weekday: 'Monday' },
    });
  });

  it('canonicalizes hyphen-separated dates to slashes', () => {
    expect(parseIncidentDate('3-4-2024')).toEqual({
      status: 'parsed',
      date: { key: '03/04/2024', weekday: 'Monday' },
    });
  });

  it('derives the Gregorian weekday', () => {
    const christmas = parseIncidentDate('12/25/2023');
    const leapDay = parseIncidentDate('02/29/2024');
    expect(christmas.status === 'parsed' && christmas.date.weekday).toBe('Monday');
    expect(leapDay.status === 'parsed' && leapDay.date.weekday).toBe('Thursday');
  });

  it.each(['13/45/2024', '02/30/2024', '2024-03-04', 'yesterday', '1/2/24', '3-4-24', '03/04/202', '03/04-2024'])('rejects %p', (raw) => {
    expect(parseIncidentDate(raw)).toEqual({ status: 'unparseable' });
  });

  it('reports absent and non-string values as missing', () => {
    expect(parseIncidentDate(undefined)).toEqual({ status: 'missing' });
    expect(parseIncidentDate(null)).toEqual({ status: 'missing' });
    expect(parseIncidentDate('  ')).toEqual({ status: 'missing' });
    expect(parseIncidentDate(20240304)).toEqual({ status: 'missing' });
  });
});
