import type {
  ItemDefinition,
  ResourceDefinition,
} from "../../shared/types/simulation/items";
import { EquipmentSlot } from "../../shared/constants/AgentEnums";
import {
  ItemFilterCategory,
  ResourceType,
} from "../../shared/constants/ResourceEnums";

/**
 * Static catalog of resources and discrete items with their tag sets.
 * Tag selectors match against these tags.
 */
export class ItemCatalog {
  private static readonly resources: Record<ResourceType, ResourceDefinition> =
    {
      [ResourceType.WOOD]: {
        id: ResourceType.WOOD,
        name: "Wood",
        tags: ["material", "wood", "fuel"],
      },
      [ResourceType.MINERAL]: {
        id: ResourceType.MINERAL,
        name: "Stone",
        tags: ["material", "stone"],
      },
      [ResourceType.SCRAP]: {
        id: ResourceType.SCRAP,
        name: "Scrap",
        tags: ["material", "scrap"],
      },
      [ResourceType.METAL]: {
        id: ResourceType.METAL,
        name: "Metal bar",
        tags: ["material", "metal"],
      },
      [ResourceType.FIBER]: {
        id: ResourceType.FIBER,
        name: "Fiber",
        tags: ["material", "fiber"],
      },
      [ResourceType.RAW_FOOD]: {
        id: ResourceType.RAW_FOOD,
        name: "Raw food",
        tags: ["food", "raw", "organic"],
      },
      [ResourceType.COOKED_MEAL]: {
        id: ResourceType.COOKED_MEAL,
        name: "Cooked meal",
        tags: ["food", "meal", "edible"],
        nutrition: 70,
      },
    };

  private static readonly items: ItemDefinition[] = [
    {
      id: "work_gloves",
      name: "Work gloves",
      tags: ["equipment", "clothing", "work"],
      filterCategory: ItemFilterCategory.EQUIPMENT,
      slot: EquipmentSlot.HANDS,
    },
    {
      id: "stone_knife",
      name: "Stone knife",
      tags: ["equipment", "tool", "weapon", "blade"],
      filterCategory: ItemFilterCategory.EQUIPMENT,
      slot: EquipmentSlot.MAIN_HAND,
    },
    {
      id: "spear",
      name: "Spear",
      tags: ["equipment", "weapon", "melee", "hunting"],
      filterCategory: ItemFilterCategory.EQUIPMENT,
      slot: EquipmentSlot.MAIN_HAND,
    },
    {
      id: "leather_vest",
      name: "Leather vest",
      tags: ["equipment", "clothing", "armor"],
      filterCategory: ItemFilterCategory.EQUIPMENT,
      slot: EquipmentSlot.BODY,
    },
    {
      id: "raw_meat",
      name: "Raw meat",
      tags: ["meat", "organic", "food", "raw"],
      filterCategory: ItemFilterCategory.MEAT,
    },
    {
      id: "deer_corpse",
      name: "Deer corpse",
      tags: ["corpse", "organic", "deer"],
      filterCategory: ItemFilterCategory.CORPSE,
    },
    {
      id: "boar_corpse",
      name: "Boar corpse",
      tags: ["corpse", "organic", "boar"],
      filterCategory: ItemFilterCategory.CORPSE,
    },
    {
      id: "rabbit_corpse",
      name: "Rabbit corpse",
      tags: ["corpse", "organic", "rabbit"],
      filterCategory: ItemFilterCategory.CORPSE,
    },
    {
      id: "circuit_board",
      name: "Circuit board",
      tags: ["component", "electronics", "salvaged"],
      filterCategory: ItemFilterCategory.COMPONENT,
    },
    {
      id: "chair",
      name: "Chair",
      tags: ["furniture", "comfort", "wood"],
      filterCategory: ItemFilterCategory.FURNITURE,
    },
  ];

  private static readonly itemIndex = new Map(
    ItemCatalog.items.map((item) => [item.id, item]),
  );

  static getResource(resource: ResourceType): ResourceDefinition {
    return this.resources[resource];
  }

  static getResourceTags(resource: ResourceType): string[] {
    return this.resources[resource].tags;
  }

  static getItem(itemId: string): ItemDefinition | undefined {
    return this.itemIndex.get(itemId);
  }

  static hasItem(itemId: string): boolean {
    return this.itemIndex.has(itemId);
  }

  static getAllItems(): ItemDefinition[] {
    return [...this.items];
  }

  static getResourceNutrition(resource: ResourceType): number {
    return this.resources[resource].nutrition ?? 0;
  }
}
