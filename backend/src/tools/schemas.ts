import { z } from 'zod';

const stationStatus = z.enum(['running', 'idle', 'maintenance', 'error']);

// z.object strips unknown keys by default, so stray model arguments are dropped
const emptyArgs = z.object({});

const stationArgs = z.object({
  station_id: z.string().min(1)
});

const optionalStationArgs = z.object({
  station_id: z.string().min(1).optional()
});

const statusArgs = z.object({
  status: stationStatus
});

const updateStationArgs = z.object({
  station_id: z.string().min(1),
  status: stationStatus
});

const limitArgs = (fallback: number) =>
  z.object({
    limit: z.coerce.number().int().min(1).max(500).default(fallback)
  });

export type ToolArgsSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

export const TOOL_ARG_SCHEMAS: Readonly<Record<string, ToolArgsSchema>> = {
  get_all_stations: emptyArgs,
  get_station: stationArgs,
  get_station_status: stationArgs,
  get_production_metrics: emptyArgs,
  calculate_oee: optionalStationArgs,
  find_bottleneck: emptyArgs,
  get_stations_by_status: statusArgs,
  get_maintenance_schedule: emptyArgs,
  update_station_status: updateStationArgs,
  get_recent_runs: limitArgs(5),
  get_alarm_log: limitArgs(10),
  get_station_energy: stationArgs,
  get_scrap_summary: emptyArgs,
  get_product_mix: emptyArgs
};

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
