import * as fs from "fs";
import * as path from "path";
import { TrackDownload } from "./shared/types";

/**
 * Stores downloaded activity tracks and hands back the path to record in
 * the activity table, relative to the table's own directory.
 */
export class GpsTrackWriter {
  private tracksDir: string;
  private tableDir: string;

  constructor(tracksDir: string, tablePath: string) {
    this.tracksDir = tracksDir;
    this.tableDir = path.dirname(path.resolve(tablePath));
  }

  write(activityId: string, track: TrackDownload): string {
    if (!fs.existsSync(this.tracksDir)) {
      fs.mkdirSync(this.tracksDir, { recursive: true });
    }

    const filePath = path.resolve(this.tracksDir, `${activityId}.${track.format}`);
    fs.writeFileSync(filePath, track.data);

    return path.relative(this.tableDir, filePath).split(path.sep).join("/");
  }
}

export default GpsTrackWriter;
