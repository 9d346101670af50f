import { describe, it, expect, beforeEach } from "vitest";
import { at, createTestContext, resource, wood } from "../../setup";
import type { StockpileSystem } from "../../../src/domain/simulation/systems/stockpiles/StockpileSystem";
import {
  ContentKind,
  ItemFilterCategory,
  ResourceType,
  SelectorKind,
} from "../../../src/shared/constants/ResourceEnums";
import { StoreFailure } from "../../../src/shared/constants/StockpileEnums";
import { GROUND_CELL_CAPACITY } from "../../../src/shared/constants/SchedulerConstants";
import { TileType } from "../../../src/shared/constants/TileTypeEnums";

const WOOD_REF = { kind: ContentKind.RESOURCE, resource: ResourceType.WOOD } as const;

describe("StockpileSystem", () => {
  let stockpiles: StockpileSystem;

  beforeEach(() => {
    stockpiles = createTestContext().runner.stockpiles;
  });

  describe("zonas", () => {
    it("debe crear una celda por casilla libre, sin duplicados", () => {
      const zone = stockpiles.createZone("Almacén", [at(1, 1), at(2, 1), at(1, 1)]);

      expect(zone?.id).toBe("zone_1");
      expect(zone?.cellKeys).toEqual(["1,1,0", "2,1,0"]);
      expect(stockpiles.getCell("1,1,0")?.capacity).toBe(100);
      expect(stockpiles.getZoneCells("zone_1")).toHaveLength(2);
    });

    it("debe rechazar una zona sin casillas libres", () => {
      stockpiles.createZone("A", [at(1, 1)]);
      expect(stockpiles.createZone("B", [at(1, 1)])).toBeNull();
      expect(stockpiles.getZones()).toHaveLength(1);
    });

    it("debe eliminar al instante una zona vacía", () => {
      const zone = stockpiles.createZone("A", [at(1, 1)]);
      if (!zone) throw new Error("zone not created");

      expect(stockpiles.requestZoneRemoval(zone.id)).toBe(true);
      expect(stockpiles.getZone(zone.id)).toBeUndefined();
      expect(stockpiles.getCell("1,1,0")).toBeUndefined();
    });

    it("debe esperar a que se vacíe una zona con contenido", () => {
      const zone = stockpiles.createZone("A", [at(1, 1)]);
      if (!zone) throw new Error("zone not created");
      stockpiles.store("1,1,0", wood(4));

      stockpiles.requestZoneRemoval(zone.id);
      const cell = stockpiles.getCell("1,1,0");
      if (!cell) throw new Error("cell missing");

      expect(zone.pendingRemoval).toBe(true);
      expect(cell.misplaced).toEqual(["resource:wood"]);
      expect(stockpiles.allows(cell, ResourceType.WOOD)).toBe(false);
      expect(stockpiles.sweepRemovedZones()).toBe(0);

      stockpiles.withdraw("1,1,0", WOOD_REF, 4);
      expect(stockpiles.sweepRemovedZones()).toBe(1);
      expect(stockpiles.getZone(zone.id)).toBeUndefined();
    });
  });

  describe("store", () => {
    beforeEach(() => {
      stockpiles.createZone("A", [at(1, 1)], { [ResourceType.WOOD]: false });
    });

    it("debe informar el primer motivo de rechazo", () => {
      expect(stockpiles.checkStore("9,9,0", resource(ResourceType.MINERAL, 1))).toBe(
        StoreFailure.UNKNOWN_CELL,
      );
      expect(stockpiles.checkStore("1,1,0", resource(ResourceType.MINERAL, 0))).toBe(
        StoreFailure.INVALID_QUANTITY,
      );
      expect(stockpiles.checkStore("1,1,0", wood(1))).toBe(StoreFailure.FILTER_DENIED);
      expect(stockpiles.checkStore("1,1,0", resource(ResourceType.MINERAL, 101))).toBe(
        StoreFailure.CAPACITY_EXCEEDED,
      );
      expect(stockpiles.checkStore("1,1,0", resource(ResourceType.MINERAL, 100))).toBeNull();
    });

    it("debe admitir todo o nada", () => {
      expect(stockpiles.store("1,1,0", resource(ResourceType.MINERAL, 98))).toEqual({
        success: true,
        cellKey: "1,1,0",
      });
      expect(stockpiles.store("1,1,0", resource(ResourceType.MINERAL, 3))).toEqual({
        success: false,
        reason: StoreFailure.CAPACITY_EXCEEDED,
      });
      expect(
        stockpiles.physicalQuantity("1,1,0", {
          kind: ContentKind.RESOURCE,
          resource: ResourceType.MINERAL,
        }),
      ).toBe(98);
    });
  });

  describe("filtros", () => {
    it("debe marcar como fuera de lugar el contenido que el filtro ya no admite", () => {
      const zone = stockpiles.createZone("A", [at(1, 1)]);
      if (!zone) throw new Error("zone not created");
      stockpiles.store("1,1,0", wood(10));

      stockpiles.setZoneFilters(zone.id, { [ResourceType.WOOD]: false });

      expect(stockpiles.getMisplacedContents()).toEqual([
        {
          cellKey: "1,1,0",
          position: at(1, 1),
          zoneId: zone.id,
          content: WOOD_REF,
          quantity: 10,
        },
      ]);

      stockpiles.setZoneFilters(zone.id, { [ResourceType.WOOD]: true });
      expect(stockpiles.getMisplacedContents()).toEqual([]);
    });

    it("debe reemplazar los filtros cuando se pide", () => {
      const zone = stockpiles.createZone("A", [at(1, 1)], {
        [ResourceType.WOOD]: false,
        [ItemFilterCategory.CORPSE]: false,
      });
      if (!zone) throw new Error("zone not created");

      stockpiles.setZoneFilters(zone.id, { [ResourceType.FIBER]: false }, true);
      expect(zone.filters).toEqual({ [ResourceType.FIBER]: false });
    });
  });

  describe("suelo", () => {
    it("debe crear una pila suelta sin límite de capacidad", () => {
      const key = stockpiles.dropOnGround(at(4, 4), wood(7));

      expect(key).toBe("4,4,0");
      expect(stockpiles.getCell(key)?.zoneId).toBeNull();
      expect(stockpiles.getCell(key)?.capacity).toBe(GROUND_CELL_CAPACITY);
      expect(stockpiles.getLooseContents()).toEqual([
        { cellKey: "4,4,0", position: at(4, 4), content: WOOD_REF, quantity: 7 },
      ]);
    });

    it("debe soltar junto a la zona cuando la casilla es de almacén", () => {
      stockpiles.createZone("A", [at(1, 1)]);
      expect(stockpiles.dropOnGround(at(1, 1), wood(2))).toBe("0,0,0");
    });

    it("debe soltar dentro del mapa y sobre casillas transitables", () => {
      const { runner } = createTestContext();
      runner.stockpiles.createZone("A", [at(15, 15)]);
      runner.world.setTile(at(14, 14), TileType.WALL);
      runner.world.setTile(at(15, 14), TileType.WALL);

      expect(runner.stockpiles.dropOnGround(at(15, 15), wood(2))).toBe("14,15,0");
    });

    it("debe apartar la pila de un muro", () => {
      const { runner } = createTestContext();
      runner.world.setTile(at(5, 5), TileType.WALL);

      expect(runner.stockpiles.dropOnGround(at(5, 5), wood(1))).toBe("4,4,0");
    });

    it("debe borrar la pila suelta al vaciarse", () => {
      const key = stockpiles.dropOnGround(at(4, 4), wood(3));

      expect(stockpiles.withdraw(key, WOOD_REF, 3)).toEqual(wood(3));
      expect(stockpiles.getCell(key)).toBeUndefined();
      expect(stockpiles.withdraw(key, WOOD_REF, 1)).toBeNull();
    });
  });

  describe("findStorageCell", () => {
    it("debe elegir la celda más cercana que admita todo el contenido", () => {
      stockpiles.createZone("A", [at(1, 1), at(5, 1)]);

      expect(stockpiles.findStorageCell(wood(5), { near: at(6, 1) })?.key).toBe("5,1,0");
      expect(
        stockpiles.findStorageCell(wood(5), { near: at(6, 1), excludeCellKey: "5,1,0" })?.key,
      ).toBe("1,1,0");
      expect(stockpiles.findStorageCell(wood(101))).toBeNull();
    });

    it("debe preferir apilar sobre el mismo recurso en empates", () => {
      stockpiles.createZone("A", [at(4, 1), at(6, 1)]);
      stockpiles.store("6,1,0", wood(1));

      expect(stockpiles.findStorageCell(wood(5), { near: at(5, 1) })?.key).toBe("6,1,0");
    });

    it("debe ignorar pilas sueltas", () => {
      stockpiles.dropOnGround(at(3, 3), wood(1));
      expect(stockpiles.findStorageCell(wood(1))).toBeNull();
    });
  });

  describe("planStorage", () => {
    it("debe repartir la producción entre celdas por distancia", () => {
      const small = createTestContext({ config: { stockpileCellCapacity: 5 } }).runner.stockpiles;
      small.createZone("A", [at(2, 1), at(1, 1)]);
      const output = { kind: ContentKind.RESOURCE, resource: ResourceType.WOOD, quantity: 7 } as const;

      expect(small.planStorage([output], at(0, 1))).toEqual([
        { cellKey: "1,1,0", output: { ...output, quantity: 5 } },
        { cellKey: "2,1,0", output: { ...output, quantity: 2 } },
      ]);
      expect(small.planStorage([{ ...output, quantity: 11 }], at(0, 1))).toBeNull();
    });

    it("debe crear instancias de objeto al almacenar lo planificado", () => {
      stockpiles.createZone("A", [at(1, 1)]);
      const plan = stockpiles.planStorage([
        { kind: ContentKind.ITEM, itemId: "work_gloves", quantity: 2 },
      ]);
      if (!plan) throw new Error("no plan");

      const created = stockpiles.storePlanned(plan, at(0, 0));

      expect(created).toHaveLength(2);
      expect(stockpiles.getCell("1,1,0")?.items.map((item) => item.instanceId)).toEqual([
        "item_1",
        "item_2",
      ]);
    });

    it("debe soltar en el suelo lo que ya no cabe", () => {
      stockpiles.createZone("A", [at(1, 1)]);
      const plan = stockpiles.planStorage([
        { kind: ContentKind.RESOURCE, resource: ResourceType.WOOD, quantity: 10 },
      ]);
      if (!plan) throw new Error("no plan");
      stockpiles.store("1,1,0", resource(ResourceType.MINERAL, 95));

      stockpiles.storePlanned(plan, at(6, 6));

      expect(stockpiles.getCell("6,6,0")?.resources).toEqual({ [ResourceType.WOOD]: 10 });
    });
  });

  describe("consultas", () => {
    it("debe contar solo lo almacenado en zonas", () => {
      stockpiles.createZone("A", [at(1, 1)]);
      stockpiles.store("1,1,0", wood(3));
      stockpiles.store("1,1,0", resource(ResourceType.MINERAL, 2));
      stockpiles.dropOnGround(at(5, 5), wood(4));

      expect(stockpiles.countStored({ kind: SelectorKind.RESOURCE, resource: ResourceType.WOOD })).toBe(3);
      expect(stockpiles.countStored({ kind: SelectorKind.TAGS, tags: ["material"] })).toBe(5);
      expect(stockpiles.getTotalsByResource()).toEqual({
        [ResourceType.WOOD]: 3,
        [ResourceType.MINERAL]: 2,
      });
      expect(stockpiles.getStats()).toEqual({
        zones: 1,
        cells: 1,
        groundPiles: 1,
        storedUnits: 5,
        misplaced: 0,
      });
    });

    it("debe restaurar zonas y celdas desde una instantánea", () => {
      stockpiles.createZone("A", [at(1, 1)]);
      stockpiles.store("1,1,0", wood(3));
      const snapshot = stockpiles.snapshot();

      stockpiles.store("1,1,0", wood(3));
      stockpiles.restore(snapshot);

      expect(stockpiles.getCell("1,1,0")?.resources).toEqual({ [ResourceType.WOOD]: 3 });
      expect(stockpiles.createZone("B", [at(2, 2)])?.id).toBe("zone_2");
    });
  });
});
