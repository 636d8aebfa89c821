import type pg from 'pg';

export const DDL_CREATE_OBSERVATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS observations (
  observation_id   BIGSERIAL        PRIMARY KEY,
  instrument       TEXT             NOT NULL,
  source           TEXT             NULL,
  provider         TEXT             NULL,
  physobs          TEXT             NULL,
  level            TEXT             NULL,
  detector         TEXT             NULL,
  resolution       TEXT             NULL,
  satellite_number INTEGER          NULL,
  wavemin          DOUBLE PRECISION NULL,
  wavemax          DOUBLE PRECISION NULL,
  start_time       TIMESTAMPTZ      NOT NULL,
  end_time         TIMESTAMPTZ      NOT NULL,
  url              TEXT             NOT NULL
)`.trim();

export const DDL_CREATE_IDX_TIME = `
CREATE INDEX IF NOT EXISTS idx_observations_time
ON observations (start_time, end_time)`.trim();

export const DDL_CREATE_IDX_INSTRUMENT = `
CREATE INDEX IF NOT EXISTS idx_observations_instrument
ON observations (lower(instrument))`.trim();

export async function applyCatalogSchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_OBSERVATIONS_TABLE);
  await client.query(DDL_CREATE_IDX_TIME);
  await client.query(DDL_CREATE_IDX_INSTRUMENT);
}
