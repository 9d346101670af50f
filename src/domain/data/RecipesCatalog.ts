import type { Recipe } from "../../shared/types/simulation/items";
import {
  ContentKind,
  ResourceType,
  SelectorKind,
} from "../../shared/constants/ResourceEnums";
import { TileType } from "../../shared/constants/TileTypeEnums";

/**
 * Static recipe catalog. Inputs select by exact resource, exact item or
 * tag set; outputs are resources or items.
 */
export class RecipesCatalog {
  private static readonly recipes: Recipe[] = [
    {
      id: "craft_work_gloves",
      name: "Work gloves",
      category: "tailoring",
      inputs: [
        {
          selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.FIBER },
          quantity: 2,
        },
      ],
      outputs: [{ kind: ContentKind.ITEM, itemId: "work_gloves", quantity: 1 }],
      work: 40,
      workstation: TileType.WORKBENCH,
    },
    {
      id: "craft_stone_knife",
      name: "Stone knife",
      category: "toolmaking",
      inputs: [
        {
          selector: {
            kind: SelectorKind.RESOURCE,
            resource: ResourceType.MINERAL,
          },
          quantity: 1,
        },
        {
          selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD },
          quantity: 1,
        },
      ],
      outputs: [{ kind: ContentKind.ITEM, itemId: "stone_knife", quantity: 1 }],
      work: 30,
      workstation: TileType.WORKBENCH,
    },
    {
      id: "craft_spear",
      name: "Spear",
      category: "toolmaking",
      inputs: [
        {
          selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD },
          quantity: 2,
        },
        { selector: { kind: SelectorKind.TAGS, tags: ["blade"] }, quantity: 1 },
      ],
      outputs: [{ kind: ContentKind.ITEM, itemId: "spear", quantity: 1 }],
      work: 45,
      workstation: TileType.WORKBENCH,
    },
    {
      id: "craft_chair",
      name: "Chair",
      category: "carpentry",
      inputs: [
        {
          selector: { kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD },
          quantity: 4,
        },
      ],
      outputs: [{ kind: ContentKind.ITEM, itemId: "chair", quantity: 1 }],
      work: 60,
      workstation: TileType.WORKBENCH,
    },
    {
      id: "smelt_metal",
      name: "Smelt scrap",
      category: "smithing",
      inputs: [
        {
          selector: {
            kind: SelectorKind.RESOURCE,
            resource: ResourceType.SCRAP,
          },
          quantity: 3,
        },
      ],
      outputs: [
        { kind: ContentKind.RESOURCE, resource: ResourceType.METAL, quantity: 1 },
      ],
      work: 50,
      workstation: TileType.STOVE,
    },
    {
      id: "cook_meal",
      name: "Cook simple meal",
      category: "cooking",
      inputs: [
        {
          selector: {
            kind: SelectorKind.RESOURCE,
            resource: ResourceType.RAW_FOOD,
          },
          quantity: 2,
        },
      ],
      outputs: [
        {
          kind: ContentKind.RESOURCE,
          resource: ResourceType.COOKED_MEAL,
          quantity: 1,
        },
      ],
      work: 25,
      workstation: TileType.STOVE,
    },
    {
      id: "cook_meat_meal",
      name: "Cook meat meal",
      category: "cooking",
      inputs: [{ selector: { kind: SelectorKind.TAGS, tags: ["meat"] }, quantity: 1 }],
      outputs: [
        {
          kind: ContentKind.RESOURCE,
          resource: ResourceType.COOKED_MEAL,
          quantity: 2,
        },
      ],
      work: 25,
      workstation: TileType.STOVE,
    },
    {
      id: "butcher_corpse",
      name: "Butcher corpse",
      category: "butchering",
      inputs: [
        { selector: { kind: SelectorKind.TAGS, tags: ["corpse"] }, quantity: 1 },
      ],
      outputs: [{ kind: ContentKind.ITEM, itemId: "raw_meat", quantity: 3 }],
      work: 35,
      workstation: TileType.WORKBENCH,
    },
  ];

  private static readonly index = new Map(
    RecipesCatalog.recipes.map((recipe) => [recipe.id, recipe]),
  );

  static getRecipeById(recipeId: string): Recipe | undefined {
    return this.index.get(recipeId);
  }

  static getAllRecipes(): Recipe[] {
    return [...this.recipes];
  }
}
