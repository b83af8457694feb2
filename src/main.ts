import { AppConfig, validateConfig } from "./configs/environment";
import { CatalogStore } from "./services/catalogStore.service";
import { RequestLog } from "./services/requestLog.service";
import { logger } from "./utils/logger";

export class GymCatalogApplication {
  public readonly config: AppConfig;
  public readonly catalog: CatalogStore;
  public readonly requestLog: RequestLog;

  constructor(config: AppConfig = validateConfig()) {
    this.config = config;
    this.catalog = new CatalogStore({
      csvPath: config.storage.catalogCsvPath,
      backupOnReplace: config.storage.backupOnReplace,
    });
    this.requestLog = new RequestLog({
      jsonPath: config.storage.requestLogPath,
      catalog: this.catalog,
    });
  }

  async initialize() {
    logger.info("Starting gym partner catalog ...");

    const gyms = await this.catalog.load();
    const requests = await this.requestLog.load();
    const { partners } = this.catalog.stats();

    logger.info(
      { gyms, partners, requests },
      `Loaded ${gyms} gyms across ${partners} partners`
    );
    if (!this.config.admin.password) {
      logger.warn("ADMIN_PASSWORD is not set, admin routes are disabled");
    }
  }
}
