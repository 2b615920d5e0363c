import { compareHourBuckets, hourOfDay, parseHourBucket } from '../../../utils/hour-bucket.utils';

describe('parseHourBucket', () => {
  it.each([
    ['2:30:15 PM', '2pm'],
    ['02:30 PM', '2pm'],
    ['9:00 AM', '9am'],
    ['12:05 PM', '12pm'],
    ['12:40 am', '12am'],
    ['  11:00 AM  ', '11am'],
    ['14:45', '2pm'],
    ['00:15', '12am'],
    ['2:45', '2am'],
  ])('buckets %p as %p', (raw, expected) => {
    expect(parseHourBucket(raw)).toEqual({ status: 'parsed', bucket: expected });
  });

  it('treats absent, blank and non-string values as missing', () => {
    expect(parseHourBucket(undefined)).toEqual({ status: 'missing', bucket: 'Unknown' });
    expect(parseHourBucket(null)).toEqual({ status: 'missing', bucket: 'Unknown' });
    expect(parseHourBucket('   ')).toEqual({ status: 'missing', bucket: 'Unknown' });
    expect(parseHourBucket(1430)).toEqual({ status: 'missing', bucket: 'Unknown' });
  });

  it('marks values no pattern accepts as unparseable', () => {
    expect(parseHourBucket('noon')).toEqual({ status: 'unparseable', bucket: 'Unknown' });
    expect(parseHourBucket('25:00')).toEqual({ status: 'unparseable', bucket: 'Unknown' });
    expect(parseHourBucket('14:30 PM')).toEqual({ status: 'unparseable', bucket: 'Unknown' });
  });

  it.each(['2:30 p', '9:15 a', '2:30 P.M.', '2:30 noon', '2:30 midnight', '2:30 in the afternoon', '2:30PM'])(
    'accepts only AM/PM as a meridiem, so %p is unparseable',
    (raw) => {
      expect(parseHourBucket(raw)).toEqual({ status: 'unparseable', bucket: 'Unknown' });
    }
  );

  it('collapses runs of whitespace before parsing', () => {
    expect(parseHourBucket('2:30  PM')).toEqual({ status: 'parsed', bucket: '2pm' });
    expect(parseHourBucket('9:05:10\t AM')).toEqual({ status: 'parsed', bucket: '9am' });
  });
});

describe('hour bucket ordering', () => {
  it('maps labels to hour of day', () => {
    expect(hourOfDay('12am')).toBe(0);
    expect(hourOfDay('1am')).toBe(1);
    expect(hourOfDay('12pm')).toBe(12);
    expect(hourOfDay('3pm')).toBe(15);
    expect(hourOfDay('Unknown')).toBeNull();
  });

  it('sorts chronologically with Unknown last', () => {
    const buckets = ['2pm', 'Unknown', '9am', '12pm', '11am'];
    expect([...buckets].sort(compareHourBuckets)).toEqual(['9am', '11am', '12pm', '2pm', 'Unknown']);
  });

  it('places 12am before 1am', () => {
    expect(['1am', 'Unknown', '12am', '11pm'].sort(compareHourBuckets)).toEqual(['12am', '1am', '11pm', 'Unknown']);
  });
});
