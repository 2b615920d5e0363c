import { InMemoryReportSink } from '../../adapters/report-sink.memory';
import { publishDisciplineReports } from '../../services/building-report.service';
import { parseIncidentRecords } from '../../utils/validation.schemas';

describe('discipline reports end to end', () => {
  const loaderOutput = [
    { incident_time: '2:30 PM', incident_location: 'Gym', student_school: 'East', incident_date: '03/04/2024' },
    { incident_time: '2:45 PM', incident_location: 'Gym', student_school: 'East', incident_date: '03/04/2024' },
    { incident_time: '9:00 AM', incident_location: 'Hall', student_school: 'West', incident_date: '03/05/2024' },
  ];

  it('builds district and building workbooks from loader output', async () => {
    const records = parseIncidentRecords(loaderOutput);
    const sink = new InMemoryReportSink();

    const summary = await publishDisciplineReports(records, sink, { districtLabel: 'District-wide' });
    expect(summary).toEqual({ reportCount: 3, buildingCount: 2, recordCount: 3 });

    const district = sink.getReport('District-wide');
    const locHour = district?.summary.sections.find((s) => s.title === 'incidents_by_loc_hour');
    expect(locHour).toEqual({
      title: 'incidents_by_loc_hour',
      header: ['Hour', 'Location', 'Count'],
      rows: [
        ['9am', 'Hall', 1],
        ['2pm', 'Gym', 2],
      ],
      empty: false,
    });

    expect(sink.getReports().map((r) => [r.label, r.detail.rows.length])).toEqual([
      ['District-wide', 3],
      ['East', 2],
      ['West', 1],
    ]);
  });

  it('marks metrics without data explicitly in a building summary', async () => {
    const sink = new InMemoryReportSink();
    await publishDisciplineReports(
      parseIncidentRecords([...loaderOutput, { incident_time: '8:10 AM', student_school: 'North' }]),
      sink
    );

    const north = sink.getReport('North');
    expect(north?.summary.sections.map((s) => s.title)).toEqual([
      'incidents_by_grade',
      'incidents_by_location',
      'incidents_by_hour',
      'incidents_by_date / day_of_week_avg',
      'incidents_by_date / date_counts',
      'incidents_by_subtype',
      'top_students',
      'top_authors',
      'incidents_by_loc_hour',
    ]);
    expect(north?.summary.sections.filter((s) => s.empty).map((s) => s.title)).toEqual([
      'incidents_by_date / day_of_week_avg',
      'incidents_by_date / date_counts',
    ]);
    expect(north?.summary.sections[3].rows).toEqual([['No Data Available']]);
    expect(north?.summary.sections[2].rows).toEqual([
      ['8am', 1],
      ['Unknown', 0],
    ]);

    const west = sink.getReport('West');
    expect(west?.summary.sections[3].rows).toEqual([['Tuesday', 1]]);
  });
});
