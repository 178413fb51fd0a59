import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CatalogStatus } from '@shared/contracts/lookup';
import { ArkhamdbApiService } from '../arkhamdb/arkhamdb-api.service';
import {
  CardCatalogRepository,
  CatalogSnapshot,
} from '../arkhamdb/repositories/card-catalog.repository';

@Injectable()
export class CatalogService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CatalogService.name);
  private inFlight: Promise<CatalogSnapshot> | null = null;

  constructor(
    private readonly arkhamdbApi: ArkhamdbApiService,
    private readonly catalog: CardCatalogRepository,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (this.configService.get<boolean>('catalog.loadOnStartup') === false) {
      return;
    }
    await this.reload().catch((error) => {
      this.logger.error(
        `Initial catalog load failed, starting with an empty catalog: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    });
  }

  /**
   * Fetches the catalog and swaps it in. Callers arriving while a reload is
   * running share its result. On failure the current snapshot stays live.
   */
  reload(): Promise<CatalogSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.fetchAndLoad().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  status(): CatalogStatus {
    const snapshot = this.catalog.getSnapshot();
    return {
      loaded: snapshot.loadedAt !== null,
      cards: snapshot.cards.length,
      loadedAt: snapshot.loadedAt?.toISOString() ?? null,
    };
  }

  private async fetchAndLoad(): Promise<CatalogSnapshot> {
    const records = await this.arkhamdbApi.fetchCatalog();
    return this.catalog.load(records);
  }
}
