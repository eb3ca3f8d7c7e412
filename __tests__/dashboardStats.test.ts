import {
  averageAttendanceRate,
  clockInsByHour,
  completionRateOf,
  dailyStatusSeries,
  dayLabel,
  hasUpcomingBirthday,
  histogram,
  hourLabels,
  personalSeries,
  punctualitySplit,
  workedHourSlots,
} from '../src/services/dashboardStats';

describe('dashboard aggregation', () => {
  it('zero-fills histograms', () => {
    expect(histogram(['todo', 'review', 'completed'] as const, ['todo', 'completed', 'todo'])).toEqual({
      todo: 2,
      review: 0,
      completed: 1,
    });
  });

  it('computes completion from a status histogram', () => {
    expect(completionRateOf({ todo: 1, review: 1, completed: 1 })).toBe(33.33);
    expect(completionRateOf({ todo: 0, completed: 0 })).toBe(0);
  });

  it('labels working hours from nine to five', () => {
    const labels = hourLabels();
    expect(labels).toHaveLength(9);
    expect(labels[0]).toBe('9:00');
    expect(labels[8]).toBe('17:00');
  });

  it('buckets clock-ins by hour and drops out-of-range times', () => {
    expect(
      clockInsByHour([
        { clockIn: '2025-03-03T09:05:00.000Z' },
        { clockIn: '2025-03-03T09:55:00.000Z' },
        { clockIn: '2025-03-03T11:00:00.000Z' },
        { clockIn: '2025-03-03T07:59:00.000Z' },
        { clockIn: null },
      ])
    ).toEqual([2, 0, 1, 0, 0, 0, 0, 0, 0]);
  });

  it('marks worked hour slots', () => {
    expect(workedHourSlots('2025-03-03T10:20:00.000Z', '2025-03-03T14:05:00.000Z')).toEqual([0, 1, 1, 1, 1, 0, 0, 0, 0]);
    expect(workedHourSlots('2025-03-03T10:20:00.000Z', null)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('builds daily status series', () => {
    const dates = ['2025-03-03', '2025-03-04'];
    const series = dailyStatusSeries(
      [
        { date: '2025-03-03', status: 'present', clockIn: null, clockOut: null },
        { date: '2025-03-03', status: 'half-day', clockIn: null, clockOut: null },
        { date: '2025-03-04', status: 'absent', clockIn: null, clockOut: null },
        { date: '2025-03-09', status: 'present', clockIn: null, clockOut: null },
      ],
      dates
    );
    expect(series).toEqual([
      { name: 'Present', data: [1, 0] },
      { name: 'Absent', data: [0, 1] },
      { name: 'Half-day', data: [1, 0] },
    ]);
  });

  it('averages per-day rates over recorded days only', () => {
    expect(averageAttendanceRate([2, 0, 1], [0, 0, 1], [1, 0, 0])).toBe(66.67);
    expect(averageAttendanceRate([0], [0], [0])).toBe(0);
  });

  it('labels days by weekday or day of month', () => {
    expect(dayLabel('2025-03-03', 'week')).toBe('Mon');
    expect(dayLabel('2025-03-03', 'month')).toBe('03');
  });

  it('finds birthdays later this month', () => {
    expect(hasUpcomingBirthday('1990-03-15', '2025-03-10')).toBe(true);
    expect(hasUpcomingBirthday('1990-03-10', '2025-03-10')).toBe(true);
    expect(hasUpcomingBirthday('1990-03-05', '2025-03-10')).toBe(false);
    expect(hasUpcomingBirthday('1990-04-15', '2025-03-10')).toBe(false);
    expect(hasUpcomingBirthday(null, '2025-03-10')).toBe(false);
  });

  it('builds a personal series with unrecorded days as null', () => {
    const result = personalSeries(
      [
        {
          date: '2025-03-03',
          status: 'present',
          clockIn: '2025-03-03T09:00:00.000Z',
          clockOut: '2025-03-03T17:00:00.000Z',
        },
        { date: '2025-03-05', status: 'absent', clockIn: null, clockOut: null },
      ],
      ['2025-03-03', '2025-03-04', '2025-03-05']
    );
    expect(result).toEqual({
      datasets: [{ name: 'Hours Worked', data: [8, 0, 0] }],
      statusData: ['present', null, 'absent'],
      summary: { presentDays: 1, absentDays: 1, halfDays: 0, notRecorded: 1, totalHours: 8 },
    });
  });

  it('splits clock-ins into on time and late', () => {
    expect(
      punctualitySplit([
        { clockIn: '2025-03-03T09:00:00.000Z' },
        { clockIn: '2025-03-03T10:00:00.000Z' },
        { clockIn: null },
      ])
    ).toEqual({ onTime: 1, late: 1 });
  });
});
