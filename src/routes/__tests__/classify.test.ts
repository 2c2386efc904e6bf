import { afterAll, beforeAll, beforeEach, describe, it, expect } from "vitest";
import pino from "pino";
import sharp from "sharp";
import { createContext, type AppContext } from "../../app/context";
import { createApp } from "../../app/http";
import { loadConfig } from "../../config";
import type { ClassifierPrediction } from "../../domain/disposal";
import type { ClassifierOracle, OracleHealth } from "../../services/classifier/classifierOracle";
import { readJson, startServer, type RunningServer } from "../../test/serverHarness";

/**
 * In-process oracle whose answer each test can swap.
 */
class ScriptedOracle implements ClassifierOracle {
  predictions: ClassifierPrediction[] = [{ label: "Cardboard", probability: 0.9 }];
  failing = false;

  async predict(): Promise<ClassifierPrediction[]> {
    if (this.failing) throw new Error("inference server down");
    return this.predictions;
  }

  async health(): Promise<OracleHealth> {
    return { status: this.failing ? "unavailable" : "healthy", oracle: this.getName() };
  }

  getName(): string {
    return "scripted";
  }
}

const oracle = new ScriptedOracle();
let ctx: AppContext;
let server: RunningServer;
let png: Buffer;

const post = (path: string, body: unknown) =>
  fetch(`${server.url}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });

const dataUrl = (image: Buffer, mime = "image/png") => `data:${mime};base64,${image.toString("base64")}`;

beforeAll(async () => {
  ctx = createContext(loadConfig({ NODE_ENV: "test", JSON_BODY_LIMIT: "64kb" }), {
    oracle,
    logger: pino({ level: "silent" }),
  });
  server = await startServer(createApp(ctx));
  png = await sharp({ create: { width: 24, height: 24, channels: 3, background: "#a0522d" } })
    .png()
    .toBuffer();
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  oracle.predictions = [{ label: "Cardboard", probability: 0.9 }];
  oracle.failing = false;
  ctx.setShuttingDown(false);
});

describe("POST /api/classify", () => {
  it("returns a verdict for a data URL image", async () => {
    const res = await post("/api/classify", {
      image_data: dataUrl(png),
      locality: "Austin",
      attrs: { greasy_or_wet: true },
    });

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      material: "Cardboard",
      action: "Compost",
      confidence: 0.9,
      confidence_text: "90.0 % Confidence Score",
      why: "Cardboard marked as 'Greasy or wet' → Compost (Austin)",
      tip: "Tear greasy cardboard into pieces so it breaks down faster in the green bin.",
      abstained: false,
      locality: "austin",
      source: "locality-rule",
      special_handling: false,
    });
  });

  it("accepts the older city field", async () => {
    const res = await post("/api/classify", { image_data: dataUrl(png), city: "Seattle" });

    expect((await readJson(res)).locality).toBe("seattle");
  });

  it("answers 200 with an abstained verdict when unsure", async () => {
    oracle.predictions = [{ label: "Glass", probability: 0.4 }];

    const res = await post("/api/classify", { image_data: dataUrl(png) });
    const body = await readJson(res);

    expect(res.status).toBe(200);
    expect(body.abstained).toBe(true);
    expect(body.action).toBe("Other");
    expect(body.confidence_text).toBe("40.0 % (low)");
  });

  it("flags hazardous items for special handling", async () => {
    oracle.predictions = [{ label: "Battery", probability: 0.9 }];

    const body = await readJson(await post("/api/classify", { image_data: dataUrl(png), attrs: { hazard: "yes" } }));

    expect(body.action).toBe("Landfill");
    expect(body.special_handling).toBe(true);
    expect(body.tip).toBe("Never put batteries in any bin; tape the terminals and take them to a battery drop-off.");
  });

  it("ignores attrs keys that are not attribute names", async () => {
    const res = await post("/api/classify", {
      image_data: dataUrl(png),
      attrs: JSON.parse('{"constructor": true, "__proto__": {"greasy_or_wet": true}}'),
    });

    expect(res.status).toBe(200);
    expect((await readJson(res)).why).toBe("Cardboard → Recyclable (Default)");
  });

  it("requires image data", async () => {
    const res = await post("/api/classify", { locality: "Austin" });

    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({ error: "INVALID_IMAGE", message: "No image data provided." });
  });

  it("rejects bytes that do not decode as an image", async () => {
    const res = await post("/api/classify", { image_data: Buffer.from("hello world").toString("base64") });

    expect(res.status).toBe(400);
    expect((await readJson(res)).error).toBe("INVALID_IMAGE");
  });

  it("rejects unsupported formats with 415", async () => {
    const tiff = await sharp(png).tiff().toBuffer();

    const res = await post("/api/classify", { image_data: dataUrl(tiff, "image/tiff") });

    expect(res.status).toBe(415);
    expect((await readJson(res)).error).toBe("UNSUPPORTED_IMAGE");
  });

  it("rejects bodies over the JSON limit with 413", async () => {
    const res = await post("/api/classify", { image_data: "A".repeat(70 * 1024) });

    expect(res.status).toBe(413);
    expect((await readJson(res)).error).toBe("IMAGE_TOO_LARGE");
  });

  it("answers 502 when the classifier fails", async () => {
    oracle.failing = true;

    const res = await post("/api/classify", { image_data: dataUrl(png) });

    expect(res.status).toBe(502);
    expect(await readJson(res)).toEqual({ error: "CLASSIFIER_UNAVAILABLE", message: "Couldn't analyze image" });
  });

  it("refuses new work while shutting down", async () => {
    ctx.setShuttingDown(true);

    const res = await post("/api/classify", { image_data: dataUrl(png) });

    expect(res.status).toBe(503);
  });
});

describe("POST /api/classify/upload", () => {
  it("classifies a multipart upload with JSON attrs", async () => {
    const form = new FormData();
    form.append("locality", "Chicago, IL");
    form.append("attrs", JSON.stringify({ greasy_or_wet: true }));
    form.append("image", new Blob([new Uint8Array(png)], { type: "image/png" }), "box.png");

    const res = await fetch(`${server.url}/api/classify/upload`, { method: "POST", body: form });
    const body = await readJson(res);

    expect(res.status).toBe(200);
    expect(body.action).toBe("Landfill");
    expect(body.locality).toBe("chicago");
    expect(body.why).toBe("Cardboard marked as 'Greasy or wet' → Landfill (Chicago)");
  });

  it("treats malformed attrs as none", async () => {
    const form = new FormData();
    form.append("attrs", "{not json");
    form.append("image", new Blob([new Uint8Array(png)], { type: "image/png" }), "box.png");

    const body = await readJson(await fetch(`${server.url}/api/classify/upload`, { method: "POST", body: form }));

    expect(body.action).toBe("Recyclable");
    expect(body.why).toBe("Cardboard → Recyclable (Default)");
  });

  it("requires a file", async () => {
    const form = new FormData();
    form.append("locality", "Austin");

    const res = await fetch(`${server.url}/api/classify/upload`, { method: "POST", body: form });

    expect(res.status).toBe(400);
    expect((await readJson(res)).error).toBe("INVALID_IMAGE");
  });
});
