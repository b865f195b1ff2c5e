/**
 * YamlProjectSerializer: stores a project as a YAML document with a single
 * `data` key. Writes go to a temp file first and are renamed into place.
 */
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import yaml from "js-yaml";
import { getLogger } from "../infra/logger.ts";
import type { ProjectReader, ProjectWriter } from "./collaborators.ts";
import type { DataProject } from "./types.ts";

const logger = getLogger("yaml_serializer");

export class YamlProjectSerializer
  implements ProjectReader<DataProject>, ProjectWriter<DataProject>
{
  async read(location: string): Promise<DataProject | null> {
    const raw = await readFile(location, "utf-8");
    const doc: unknown = yaml.load(raw);

    if (doc === undefined || doc === null) {
      logger.warn({ location }, "project_file_empty");
      return null;
    }
    if (typeof doc !== "object" || Array.isArray(doc) || !("data" in doc)) {
      throw new Error(`Project file '${location}' must be a mapping with a 'data' key`);
    }

    return { location, data: doc.data };
  }

  async write(project: DataProject, location: string): Promise<boolean> {
    await mkdir(dirname(location), { recursive: true });

    const content = yaml.dump({ data: project.data }, { lineWidth: -1 });
    const tmpPath = `${location}.tmp`;
    try {
      await writeFile(tmpPath, content, "utf-8");
      await rename(tmpPath, location);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
    return true;
  }
}
