export interface Observation {
  id: bigint;
  instrument: string;
  source: string | null;
  provider: string | null;
  physobs: string | null;
  level: string | null;
  detector: string | null;
  resolution: string | null;
  satelliteNumber: number | null;
  wavemin: number | null;
  wavemax: number | null;
  startTime: Date;
  endTime: Date;
  url: string;
}

// Type alias so it satisfies pg's QueryResultRow
export type ObservationRow = {
  observation_id: string; // pg returns BIGSERIAL as string by default
  instrument: string;
  source: string | null;
  provider: string | null;
  physobs: string | null;
  level: string | null;
  detector: string | null;
  resolution: string | null;
  satellite_number: number | null;
  wavemin: number | null;
  wavemax: number | null;
  start_time: Date;                   // pg auto-parses TIMESTAMPTZ
  end_time: Date;
  url: string;
};

export function mapObservationRow(row: ObservationRow): Observation {
  return {
    id: BigInt(row.observation_id),
    instrument: row.instrument,
    source: row.source,
    provider: row.provider,
    physobs: row.physobs,
    level: row.level,
    detector: row.detector,
    resolution: row.resolution,
    satelliteNumber: row.satellite_number,
    wavemin: row.wavemin,
    wavemax: row.wavemax,
    startTime: row.start_time,
    endTime: row.end_time,
    url: row.url,
  };
}
