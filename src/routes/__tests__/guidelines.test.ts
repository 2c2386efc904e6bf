import { afterAll, beforeAll, describe, it, expect } from "vitest";
import pino from "pino";
import { createContext } from "../../app/context";
import { createApp } from "../../app/http";
import { loadConfig } from "../../config";
import { StaticClassifierOracle } from "../../services/classifier/staticClassifierOracle";
import { readJson, startServer, type RunningServer } from "../../test/serverHarness";

let server: RunningServer;

beforeAll(async () => {
  const ctx = createContext(loadConfig({ NODE_ENV: "test" }), {
    oracle: new StaticClassifierOracle([{ label: "Glass", probability: 0.9 }]),
    logger: pino({ level: "silent" }),
  });
  server = await startServer(createApp(ctx));
});

afterAll(async () => {
  await server.close();
});

describe("GET /api/guidelines/localities", () => {
  it("lists localities with display names", async () => {
    const body = await readJson(await fetch(`${server.url}/api/guidelines/localities`));

    expect(body.localities).toContain("austin");
    expect(body.options).toContainEqual({ key: "san francisco", name: "San Francisco" });
  });
});

describe("GET /api/guidelines/:locality/:material", () => {
  it("shows the rules for a material in a locality", async () => {
    const body = await readJson(await fetch(`${server.url}/api/guidelines/Austin/Cardboard`));

    expect(body).toEqual({
      locality: "austin",
      knownLocality: true,
      effectiveLocality: "austin",
      material: "Cardboard",
      rules: [
        { material: "Cardboard", locality: "austin", when: "greasy_or_wet", action: "Compost", priority: 20 },
        { material: "Cardboard", locality: "austin", when: "always", action: "Recyclable", priority: 0 },
      ],
      fallback: "Recyclable",
    });
  });

  it("includes rule instructions", async () => {
    const body = await readJson(await fetch(`${server.url}/api/guidelines/default/Plastic`));

    expect(Array.isArray(body.rules) && body.rules[0]).toEqual({
      material: "Plastic",
      locality: "default",
      when: "soft_bag",
      action: "Other",
      priority: 50,
      instruction: "take to a store drop-off bin for plastic film",
    });
  });

  it("reports the default mapping when no rule exists", async () => {
    const body = await readJson(await fetch(`${server.url}/api/guidelines/atlantis/Battery`));

    expect(body.knownLocality).toBe(false);
    expect(body.effectiveLocality).toBe("default");
    expect(body.rules).toEqual([]);
    expect(body.fallback).toBe("Other");
  });
});

it("answers unknown routes with JSON 404", async () => {
  const res = await fetch(`${server.url}/api/nope`);

  expect(res.status).toBe(404);
  expect(await readJson(res)).toEqual({ error: "NOT_FOUND", message: "No route for GET /api/nope" });
});
