import fs from "node:fs";
import path from "node:path";
import { InMemoryCourseRepository, repositoryDumpSchema } from "./memory-repository.js";

/** In-memory repository mirrored to a JSON file after each committed write. */
export class FileCourseRepository extends InMemoryCourseRepository {
  private constructor(
    private readonly filePath: string,
    seed: unknown
  ) {
    super(repositoryDumpSchema.parse(seed));
  }

  static open(filePath: string): FileCourseRepository {
    let seed: unknown = {};
    if (fs.existsSync(filePath)) {
      seed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    }
    return new FileCourseRepository(filePath, seed);
  }

  protected override onCommit(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(this.dump(), null, 2), "utf8");
    fs.renameSync(tmp, this.filePath);
  }
}
