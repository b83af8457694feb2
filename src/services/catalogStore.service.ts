import { FieldIssue, NotFoundError, ValidationError } from "../common/errors";
import { GymCsvLoader, gymCsvLoader } from "../loaders/gymCsv.loader";
import {
  GymDetails,
  GymInput,
  GymRecord,
  NearbyGym,
  NearbySearchParams,
  PartnerSummary,
} from "../types/model/gym.model";
import { subscriptionCalculator } from "../utils/calculators";
import { backupFile, readFileIfExists, writeFileAtomic } from "../utils/fileStore";
import { haversineDistance } from "../utils/geo";
import { logger as defaultLogger, Logger } from "../utils/logger";
import { checkAgainst, gymInputSchema, validateAgainst } from "../utils/validators";
import { WriteLock } from "../utils/writeLock";

export interface CatalogStoreOptions {
  csvPath: string;
  backupOnReplace?: boolean;
  now?: () => Date;
  loader?: GymCsvLoader;
  logger?: Logger;
}

export interface CatalogStats {
  gyms: number;
  partners: number;
}

const cloneGym = <T extends GymRecord>(gym: T): T => ({
  ...gym,
  amenities: [...gym.amenities],
});

/**
 * In-memory gym catalog backed by a CSV file.
 *
 * Writes go through a single lock and commit by rewriting the whole file;
 * the in-memory snapshot is swapped only once the file is in place. Reads
 * never wait on the lock.
 */
export class CatalogStore {
  private gyms: readonly GymRecord[] = [];
  private readonly lock = new WriteLock();
  private readonly csvPath: string;
  private readonly backupOnReplace: boolean;
  private readonly now: () => Date;
  private readonly loader: GymCsvLoader;
  private readonly logger: Logger;

  constructor(options: CatalogStoreOptions) {
    this.csvPath = options.csvPath;
    this.backupOnReplace = options.backupOnReplace ?? true;
    this.now = options.now ?? (() => new Date());
    this.loader = options.loader ?? gymCsvLoader;
    this.logger = options.logger ?? defaultLogger;
  }

  get size(): number {
    return this.gyms.length;
  }

  async load(): Promise<number> {
    return this.lock.run(async () => {
      const text = await readFileIfExists(this.csvPath);
      if (text === null || text.trim() === "") {
        this.logger.warn({ csvPath: this.csvPath }, "Catalog file missing or empty, starting with no gyms");
        this.gyms = [];
        return 0;
      }

      const loaded: GymRecord[] = [];
      for (const { row, input } of this.loader.parse(text)) {
        const result = checkAgainst(gymInputSchema, input);
        if (!result.ok) {
          this.logger.warn({ row, issues: result.issues }, "Skipping invalid gym row");
          continue;
        }
        loaded.push({ id: row, ...result.value });
      }

      this.gyms = loaded;
      this.logger.info({ csvPath: this.csvPath, gyms: loaded.length }, "Catalog loaded");
      return loaded.length;
    });
  }

  listAll(): GymRecord[] {
    return this.gyms.map(cloneGym);
  }

  /** Distinct partners with their gym counts, in first-seen order. */
  listPartners(): PartnerSummary[] {
    const counts = new Map<string, number>();
    for (const gym of this.gyms) {
      counts.set(gym.partnerName, (counts.get(gym.partnerName) ?? 0) + 1);
    }
    return Array.from(counts, ([name, count]) => ({ name, count }));
  }

  filterByPartner(partner?: string): GymRecord[] {
    if (!partner) {
      return this.listAll();
    }
    return this.gyms.filter((gym) => gym.partnerName === partner).map(cloneGym);
  }

  findNearby({ latitude, longitude, partner, limit }: NearbySearchParams): NearbyGym[] {
    if (limit <= 0) {
      return [];
    }

    // Array.prototype.sort is stable, so equal distances keep catalog order.
    return this.filterByPartner(partner)
      .map((gym) => ({
        ...gym,
        distance: haversineDistance(latitude, longitude, gym.latitude, gym.longitude),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);
  }

  getById(id: number): GymRecord {
    const gym = this.gyms.find((candidate) => candidate.id === id);
    if (!gym) {
      throw new NotFoundError(`Gym ${id} not found`);
    }
    return cloneGym(gym);
  }

  getDetails(id: number): GymDetails {
    const gym = this.getById(id);
    return {
      ...gym,
      subscriptionPlans: subscriptionCalculator.calculatePlans(gym.subscriptionAmount),
    };
  }

  stats(): CatalogStats {
    return { gyms: this.gyms.length, partners: this.listPartners().length };
  }

  async addRecord(fields: unknown): Promise<GymRecord> {
    const input = validateAgainst(gymInputSchema, fields);

    return this.lock.run(async () => {
      const id = this.gyms.reduce((max, gym) => Math.max(max, gym.id), 0) + 1;
      const record: GymRecord = { id, ...input };
      await this.commit([...this.gyms, record]);

      this.logger.info({ id, gymName: record.gymName }, "Gym added");
      return cloneGym(record);
    });
  }

  async deleteById(id: number): Promise<GymRecord> {
    return this.lock.run(async () => {
      const removed = this.gyms.find((gym) => gym.id === id);
      if (!removed) {
        throw new NotFoundError(`Gym ${id} not found`);
      }
      await this.commit(this.gyms.filter((gym) => gym.id !== id));

      this.logger.info({ id }, "Gym deleted");
      return cloneGym(removed);
    });
  }

  /**
   * Replaces the whole catalog. Every record is validated first; a single
   * invalid record rejects the call and leaves file and memory untouched.
   */
  async replaceAll(records: unknown): Promise<number> {
    const inputs = this.validateAll(records);

    return this.lock.run(async () => {
      const next = inputs.map((input, index): GymRecord => ({ id: index + 1, ...input }));

      if (this.backupOnReplace) {
        const backupPath = await backupFile(this.csvPath, this.now());
        if (backupPath) {
          this.logger.info({ backupPath }, "Catalog backup created");
        }
      }
      await this.commit(next);

      this.logger.info({ gyms: next.length }, "Catalog replaced");
      return next.length;
    });
  }

  private validateAll(records: unknown): GymInput[] {
    if (!Array.isArray(records)) {
      throw new ValidationError([{ field: "records", message: "records must be a list" }]);
    }
    if (records.length === 0) {
      throw new ValidationError([
        { field: "records", message: "records must contain at least one gym" },
      ]);
    }

    const inputs: GymInput[] = [];
    const issues: FieldIssue[] = [];
    records.forEach((record: unknown, index) => {
      const result = checkAgainst(gymInputSchema, record, `records[${index}].`);
      if (result.ok) {
        inputs.push(result.value);
      } else {
        issues.push(...result.issues);
      }
    });

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }
    return inputs;
  }

  private async commit(next: GymRecord[]): Promise<void> {
    await writeFileAtomic(this.csvPath, this.loader.serialize(next));
    this.gyms = next;
  }
}
