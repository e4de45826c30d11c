import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { RailStation } from "../core/dto";
import { RailStationsPort } from "../core/ports";

export const DEFAULT_STATIONS_FILE = path.join(
  __dirname,
  "../../data/rail-stations.json"
);

const stationListSchema = z.array(
  z.object({
    code: z.string().length(3),
    name: z.string().min(1),
    city: z.string().min(1),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
  })
);

/**
 * Major National Rail stations from a JSON file, read once
 */
export class FileStationDirectory implements RailStationsPort {
  private loading?: Promise<RailStation[]>;

  constructor(private file: string = DEFAULT_STATIONS_FILE) {}

  stations(): Promise<RailStation[]> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<RailStation[]> {
    const raw: unknown = JSON.parse(await readFile(this.file, "utf8"));
    const parsed = stationListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Invalid station list in ${this.file}: ${parsed.error.errors[0]?.message ?? "unknown"}`
      );
    }
    return parsed.data;
  }
}
