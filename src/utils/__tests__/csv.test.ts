import { describe, test, expect } from '@jest/globals';
import { toCsv } from '../csv';

describe('toCsv', () => {
  test('writes a header row and one line per row', () => {
    const csv = toCsv(['Attendee', 'Distance (m)'], [
      { Attendee: 'student-1', 'Distance (m)': 12.5 },
      { Attendee: 'student-2', 'Distance (m)': null },
    ]);
    expect(csv).toBe('Attendee,Distance (m)\r\nstudent-1,12.5\r\nstudent-2,');
  });

  test('quotes cells holding commas, quotes or line breaks', () => {
    const csv = toCsv(['Name'], [{ Name: 'Doe, Jane' }, { Name: 'say "hi"' }, { Name: 'two\nlines' }]);
    expect(csv).toBe('Name\r\n"Doe, Jane"\r\n"say ""hi"""\r\n"two\nlines"');
  });

  test('leaves missing columns empty', () => {
    expect(toCsv(['A', 'B'], [{ A: 'x' }])).toBe('A,B\r\nx,');
  });
});
