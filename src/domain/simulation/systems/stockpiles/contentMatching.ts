import { ItemCatalog } from "../../../data/ItemCatalog";
import {
  ContentKind,
  ItemFilterCategory,
  SelectorKind,
  isResourceType,
  type ResourceType,
} from "../../../../shared/constants/ResourceEnums";
import type { ItemInstance } from "../../../../shared/types/simulation/items";
import type {
  ContentRef,
  FilterKey,
  MaterialRequirement,
  MaterialSelector,
  OutputSpec,
  StorableContent,
} from "../../../../shared/types/simulation/stockpiles";

/**
 * Tag match: every required tag is present.
 */
export function tagsMatch(tags: readonly string[], required: readonly string[]): boolean {
  return required.every((tag) => tags.includes(tag));
}

export function selectorMatchesResource(
  selector: MaterialSelector,
  resource: ResourceType,
): boolean {
  switch (selector.kind) {
    case SelectorKind.RESOURCE:
      return selector.resource === resource;
    case SelectorKind.ITEM:
      return false;
    case SelectorKind.TAGS:
      return tagsMatch(ItemCatalog.getResourceTags(resource), selector.tags);
  }
}

export function selectorMatchesItem(
  selector: MaterialSelector,
  item: ItemInstance,
): boolean {
  switch (selector.kind) {
    case SelectorKind.RESOURCE:
      return false;
    case SelectorKind.ITEM:
      return selector.itemId === item.itemId;
    case SelectorKind.TAGS:
      return tagsMatch(item.tags, selector.tags);
  }
}

export function contentKey(ref: ContentRef): string {
  return ref.kind === ContentKind.RESOURCE
    ? `resource:${ref.resource}`
    : `item:${ref.instanceId}`;
}

export function refOf(content: StorableContent): ContentRef {
  return content.kind === ContentKind.RESOURCE
    ? { kind: ContentKind.RESOURCE, resource: content.resource }
    : { kind: ContentKind.ITEM, instanceId: content.item.instanceId };
}

export function quantityOf(content: StorableContent | OutputSpec): number {
  return content.kind === ContentKind.RESOURCE || "quantity" in content
    ? content.quantity
    : 1;
}

export function filterKeyOf(content: StorableContent | OutputSpec): FilterKey {
  if (content.kind === ContentKind.RESOURCE) return content.resource;
  if ("item" in content) return content.item.filterCategory;
  return (
    ItemCatalog.getItem(content.itemId)?.filterCategory ??
    ItemFilterCategory.COMPONENT
  );
}

export function isMaterialSelector(value: unknown): value is MaterialSelector {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return false;
  }
  switch (value.kind) {
    case SelectorKind.RESOURCE:
      return "resource" in value && isResourceType(value.resource);
    case SelectorKind.ITEM:
      return (
        "itemId" in value &&
        typeof value.itemId === "string" &&
        ItemCatalog.hasItem(value.itemId)
      );
    case SelectorKind.TAGS:
      return (
        "tags" in value &&
        Array.isArray(value.tags) &&
        value.tags.length > 0 &&
        value.tags.every((tag: unknown) => typeof tag === "string")
      );
    default:
      return false;
  }
}

export function isMaterialRequirement(
  value: unknown,
): value is MaterialRequirement {
  return (
    typeof value === "object" &&
    value !== null &&
    "selector" in value &&
    "quantity" in value &&
    isMaterialSelector(value.selector) &&
    Number.isInteger(value.quantity) &&
    typeof value.quantity === "number" &&
    value.quantity > 0
  );
}

export function describeSelector(selector: MaterialSelector): string {
  switch (selector.kind) {
    case SelectorKind.RESOURCE:
      return selector.resource;
    case SelectorKind.ITEM:
      return `item ${selector.itemId}`;
    case SelectorKind.TAGS:
      return `tags [${selector.tags.join(", ")}]`;
  }
}
