import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Request, Response } from "express";
import { createSimulationRoutes } from "../../src/application/routes/simulationRoutes";
import { SimulationController } from "../../src/infrastructure/controllers/simulationController";
import { createTestContext } from "../setup";

interface RouteLayer {
  route?: {
    path: string;
    methods: Record<string, boolean>;
    stack: Array<{ handle: (req: Request, res: Response, next: () => void) => void }>;
  };
}

function isRouteLayer(value: unknown): value is RouteLayer {
  return typeof value === "object" && value !== null && "route" in value;
}

describe("SimulationRoutes", () => {
  let controller: SimulationController;
  let layers: RouteLayer[];

  const routeFor = (method: string, path: string) =>
    layers.find((layer) => layer.route?.path === path && layer.route.methods[method])?.route;

  beforeEach(() => {
    controller = new SimulationController(createTestContext().runner);
    const stack: unknown[] = createSimulationRoutes(controller).stack;
    layers = stack.filter(isRouteLayer);
  });

  it("debe montar los endpoints del planificador", () => {
    const routes = layers.flatMap((layer) =>
      layer.route
        ? Object.keys(layer.route.methods).map((method) => `${method.toUpperCase()} ${layer.route?.path}`)
        : [],
    );

    expect(routes).toEqual([
      "GET /api/sim/health",
      "GET /api/jobs",
      "GET /api/jobs/stats",
      "POST /api/commands",
      "GET /api/stockpiles",
      "GET /api/snapshot",
      "POST /api/snapshot",
    ]);
  });

  it("debe leer la captura subida con un parser binario propio", () => {
    expect(routeFor("post", "/api/snapshot")?.stack).toHaveLength(2);
    expect(routeFor("post", "/api/commands")?.stack).toHaveLength(1);
  });

  it("debe delegar en el controlador", () => {
    const healthSpy = vi.spyOn(controller, "health").mockImplementation(() => undefined);
    const handler = routeFor("get", "/api/sim/health")?.stack[0];
    const req: Partial<Request> = {};
    const res: Partial<Response> = {};

    handler?.handle(req as Request, res as Response, () => undefined);

    expect(healthSpy).toHaveBeenCalledWith(req, res);
  });
});
