import type { BannerItem } from "../domain/BannerItem";
import { isWritableSource, type BannerPayloadSource } from "../source/BannerPayloadSource";
import { decodeBannerText, type BannerService } from "./BannerService";

// Application use cases over the banner service.
// - Loads are serialized: the service is single-writer, so each load waits for
//   the previous one to finish (success or failure) before it starts.
// - A load and the save that publishes it share one queue slot, so the source
//   always ends on the same payload as the collection.
// - Reads are not queued; they see the last completed load.

export type LoadAndPersistResult = Readonly<{
  loaded: number;
  persisted: boolean;
}>;

export class BannerUseCases {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly service: BannerService) {}

  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const next = this.queue.then(op, op);

    // Ensure queue advances even if an op fails.
    this.queue = next.then(() => undefined, () => undefined);

    return next;
  }

  async getAllBanners(): Promise<readonly BannerItem[]> {
    return this.service.getAllBanners();
  }

  loadBannersFromJSONString(text: string): Promise<number> {
    return this.enqueue(async () => {
      const loaded = this.service.loadFromJSONString(text);
      console.log(`[Banners] Loaded ${loaded} banner(s)`);
      return loaded;
    });
  }

  // Saves only after a successful load. A failed save keeps the load and reports persisted: false.
  loadAndPersist(bytes: Uint8Array, source: BannerPayloadSource): Promise<LoadAndPersistResult> {
    return this.enqueue(async () => {
      const loaded = this.service.loadFromJSON(bytes);
      console.log(`[Banners] Loaded ${loaded} banner(s)`);

      if (!isWritableSource(source)) return { loaded, persisted: false };
      try {
        await source.save(decodeBannerText(bytes));
        return { loaded, persisted: true };
      } catch (err) {
        console.error(`[Banners] Payload loaded but not saved to ${source.kind} source:`, err);
        return { loaded, persisted: false };
      }
    });
  }

  // undefined when the source has nothing published; the collection is left as is.
  refreshFromSource(source: BannerPayloadSource): Promise<number | undefined> {
    return this.enqueue(async () => {
      const payload = await source.readLatest();
      if (payload === null) {
        console.log(`[Banners] ${source.kind} source has no payload yet`);
        return undefined;
      }
      const loaded = this.service.loadFromJSONString(payload);
      console.log(`[Banners] Loaded ${loaded} banner(s) from ${source.kind} source`);
      return loaded;
    });
  }
}
