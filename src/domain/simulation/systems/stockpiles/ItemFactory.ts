import { injectable } from "inversify";
import { ItemCatalog } from "../../../data/ItemCatalog";
import type { ItemInstance } from "../../../../shared/types/simulation/items";

/**
 * Creates item instances with stable, snapshot-restorable ids.
 */
@injectable()
export class ItemFactory {
  private nextSeq = 0;

  public create(itemId: string): ItemInstance | null {
    const definition = ItemCatalog.getItem(itemId);
    if (!definition) return null;

    this.nextSeq++;
    return {
      instanceId: `item_${this.nextSeq}`,
      itemId,
      tags: [...definition.tags],
      filterCategory: definition.filterCategory,
    };
  }

  public get sequence(): number {
    return this.nextSeq;
  }

  public restore(sequence: number): void {
    this.nextSeq = sequence;
  }
}
