import type { Collection, MongoClient } from "mongodb";
import type { Aoi, AoiRecord } from "../../core/aoi/aoi.types";
import { parseAoiRecords } from "../../core/aoi/parseAoi";
import type { AoiRegistry } from "../../ports/AoiRegistry";
import { DEFAULT_DB_NAME } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export class MongoAoiRegistry implements AoiRegistry {
  private collection?: Collection<AoiRecord>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = DEFAULT_DB_NAME,
    private readonly collectionName = "aois"
  ) {}

  private async getCollection(): Promise<Collection<AoiRecord>> {
    if (this.collection) return this.collection;

    await this.client.connect();
    const col = this.client.db(this.dbName).collection<AoiRecord>(this.collectionName);
    for (const idx of mongoIndexes.aoiCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async loadSnapshot(): Promise<Aoi[]> {
    const col = await this.getCollection();
    const records = await col.find({}, { projection: { _id: 0 } }).toArray();
    return parseAoiRecords(records, `mongo collection ${this.collectionName}`);
  }
}
