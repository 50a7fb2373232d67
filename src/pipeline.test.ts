import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkError, TranslationError } from "./core/errors";
import { INPUT_TEMPLATE } from "./core/file-reader";
import { runPipeline } from "./pipeline";
import { createFakeHttp, FakeRoute } from "./testing/fake-http";
import { productPage, sitemapIndex, urlset } from "./testing/fixtures";
import { OpenAiTranslator, TranslationInput, Translator } from "./translation/translator";
import { AppConfig } from "./types";

const mocks = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: mocks.create } };
  },
}));

const ROOT = "https://shop.test/sitemap.xml";
const PRODUCTS = "https://shop.test/sitemap_products_1.xml";
const URL_12345 = "https://shop.test/products/screwdriver-12345";
const URL_67890 = "https://shop.test/products/hammer-67890";
const URL_99999 = "https://shop.test/products/99999";

const HEADER = "Product Code,Product Name,Image URL,Product URL,Spanish Description";

class FakeTranslator implements Translator {
  readonly calls: { product: TranslationInput; englishText: string }[] = [];

  async translate(product: TranslationInput, englishText: string): Promise<string> {
    this.calls.push({ product, englishText });
    return `Producto ${product.code}`;
  }
}

class FailingTranslator implements Translator {
  async translate(product: TranslationInput): Promise<string> {
    throw new TranslationError("OpenAI API error: quota exceeded", product.code);
  }
}

function site(overrides: Record<string, FakeRoute> = {}) {
  return createFakeHttp({
    [ROOT]: sitemapIndex(PRODUCTS),
    [PRODUCTS]: urlset(URL_12345, URL_67890, URL_99999),
    [URL_12345]: productPage("Screwdriver", "/img/12345.jpg"),
    [URL_67890]: productPage("Hammer", "/img/67890.jpg", "2 lb"),
    ...overrides,
  });
}

describe("runPipeline", () => {
  let tmpDir: string;

  function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
      sitemapUrl: ROOT,
      inputCsv: path.join(tmpDir, "codes.csv"),
      outputCsv: path.join(tmpDir, "products.csv"),
      recursive: true,
      maxProducts: 0,
      debug: false,
      forceMode: false,
      openaiApiKey: null,
      openaiModel: "gpt-4o",
      sitemapFilter: null,
      urlFilter: null,
      brand: null,
      listingNote: null,
      deduplicateCodes: true,
      skipExisting: false,
      timeout: 1000,
      delayMs: 0,
      retries: 0,
      ...overrides,
    };
  }

  function writeCodes(...codes: string[]): void {
    fs.writeFileSync(path.join(tmpDir, "codes.csv"), ["ProductCode", ...codes].join("\n") + "\n");
  }

  function outputLines(): string[] {
    const content = fs.readFileSync(path.join(tmpDir, "products.csv"), "utf-8");
    return content.replace(/^\uFEFF/, "").split("\n").slice(0, -1);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipeline-"));
    mocks.create.mockReset();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a row for each matched code and reports the unmatched ones", async () => {
    writeCodes("12345", "55555");
    const { http } = site();
    const translator = new FakeTranslator();

    const summary = await runPipeline(makeConfig(), { http, translator });

    expect(outputLines()).toEqual([
      HEADER,
      `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},Producto 12345`,
    ]);
    expect(summary).toMatchObject({
      sitemap_url: ROOT,
      input_created: false,
      total_codes: 2,
      total_leaf_urls: 3,
      total_matched: 1,
      total_not_found: 1,
      total_processed: 1,
      total_written: 1,
      total_translated: 1,
      total_skipped: 0,
      failures: [],
    });
    expect(translator.calls).toHaveLength(1);
    expect(translator.calls[0].product).toEqual({
      code: "12345",
      name: "Screwdriver",
      raw_description: "Sturdy tool for daily work.",
      specifications: { Weight: "1.5 lb" },
      items_in_set: [],
    });
    expect(translator.calls[0].englishText.split("\n")[0]).toBe("12345 - Screwdriver");
  });

  it("falls back to the sitemap image caption and image for a bare page", async () => {
    writeCodes("12345");
    const { http } = site({
      [PRODUCTS]: `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9"
        xmlns:image="http://www.google.com/schemas/sitemap-image/1.1">
  <url>
    <loc>${URL_12345}</loc>
    <image:image>
      <image:loc>https://cdn.shop.test/sitemap/12345.jpg</image:loc>
      <image:caption>Precision Screwdriver</image:caption>
    </image:image>
  </url>
</urlset>`,
      [URL_12345]: "<html><body><p>Coming soon</p></body></html>",
    });

    const summary = await runPipeline(makeConfig(), { http, translator: new FakeTranslator() });

    expect(summary.total_skipped).toBe(0);
    expect(outputLines()).toEqual([
      HEADER,
      `12345,Precision Screwdriver,https://cdn.shop.test/sitemap/12345.jpg,${URL_12345},Producto 12345`,
    ]);
  });

  it("writes an empty row for an unmatched code in force mode", async () => {
    writeCodes("12345", "55555");
    const { http, requested } = site();

    const summary = await runPipeline(makeConfig({ forceMode: true }), {
      http,
      translator: new FakeTranslator(),
    });

    expect(outputLines()).toEqual([
      HEADER,
      `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},Producto 12345`,
      "55555,,,,",
    ]);
    expect(summary.total_written).toBe(2);
    expect(summary.total_not_found).toBe(1);
    expect(requested).toEqual([ROOT, PRODUCTS, URL_12345]);
  });

  it("converts pound weights to kilograms through the OpenAI translator", async () => {
    writeCodes("12345");
    mocks.create.mockResolvedValue({
      choices: [{ message: { content: "Destornillador\nPeso: 1.5 lb" } }],
    });
    const translator = new OpenAiTranslator({ apiKey: "test-secret", model: "gpt-4o" });

    await runPipeline(makeConfig(), { http: site().http, translator });

    const prompt: unknown = mocks.create.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain('"Weight": "0.68 kg"');
    expect(outputLines()).toEqual([
      HEADER,
      `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},"Destornillador`,
      'Peso: 0.68 kg"',
    ]);
  });

  it("appends to the output of an earlier run", async () => {
    writeCodes("12345");
    const deps = { http: site().http, translator: new FakeTranslator() };
    const row = `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},Producto 12345`;

    await runPipeline(makeConfig(), deps);
    await runPipeline(makeConfig(), deps);

    expect(outputLines()).toEqual([HEADER, row, row]);
  });

  it("skips codes already in the output when asked to", async () => {
    writeCodes("12345", "67890");
    fs.writeFileSync(
      path.join(tmpDir, "products.csv"),
      `\uFEFF${HEADER}\n12345,Screwdriver,,,Producto 12345\n`
    );
    const { http, requested } = site();

    const summary = await runPipeline(makeConfig({ skipExisting: true }), {
      http,
      translator: new FakeTranslator(),
    });

    expect(summary.total_codes).toBe(1);
    expect(requested).not.toContain(URL_12345);
    expect(outputLines()).toEqual([
      HEADER,
      "12345,Screwdriver,,,Producto 12345",
      `67890,Hammer,https://cdn.shop.test/img/67890.jpg,${URL_67890},Producto 67890`,
    ]);
  });

  it("matches already written codes regardless of case", async () => {
    writeCodes("AB-12", "12345");
    fs.writeFileSync(path.join(tmpDir, "products.csv"), `\uFEFF${HEADER}\nab-12,Pliers,,,Alicates\n`);
    const { http } = site();

    const summary = await runPipeline(makeConfig({ skipExisting: true }), {
      http,
      translator: new FakeTranslator(),
    });

    expect(summary.total_codes).toBe(1);
    expect(outputLines()).toEqual([
      HEADER,
      "ab-12,Pliers,,,Alicates",
      `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},Producto 12345`,
    ]);
  });

  it("leaves no output file behind when nothing matches", async () => {
    writeCodes("55555");

    const summary = await runPipeline(makeConfig(), {
      http: site().http,
      translator: new FakeTranslator(),
    });

    expect(summary.total_matched).toBe(0);
    expect(fs.existsSync(path.join(tmpDir, "products.csv"))).toBe(false);
  });

  it("stops after MAX_PRODUCTS products", async () => {
    writeCodes("67890", "12345");
    const { http, requested } = site();

    const summary = await runPipeline(makeConfig({ maxProducts: 1 }), {
      http,
      translator: new FakeTranslator(),
    });

    expect(summary.total_matched).toBe(2);
    expect(summary.total_processed).toBe(1);
    expect(requested).not.toContain(URL_12345);
    expect(outputLines()).toHaveLength(2);
    expect(outputLines()[1].startsWith("67890,Hammer,")).toBe(true);
  });

  it("processes a repeated code once", async () => {
    writeCodes("12345", "12345");

    const summary = await runPipeline(makeConfig(), {
      http: site().http,
      translator: new FakeTranslator(),
    });

    expect(summary.total_codes).toBe(1);
    expect(outputLines()).toHaveLength(2);
  });

  it("skips products whose page cannot be fetched or scraped", async () => {
    writeCodes("12345", "67890");
    const { http } = site({
      [URL_12345]: { status: 404 },
      [URL_67890]: "<html><body><p>Discontinued</p></body></html>",
    });

    const summary = await runPipeline(makeConfig(), { http, translator: new FakeTranslator() });

    expect(summary).toMatchObject({ total_processed: 2, total_written: 0, total_skipped: 2 });
    expect(summary.failures).toEqual([
      { code: "12345", url: URL_12345, stage: "fetch", error: "HTTP 404: Not Found" },
      {
        code: "67890",
        url: URL_67890,
        stage: "scrape",
        error: `No product name found on ${URL_67890}`,
      },
    ]);
    expect(fs.existsSync(path.join(tmpDir, "products.csv"))).toBe(false);
  });

  it("still writes the row when translation fails", async () => {
    writeCodes("12345");

    const summary = await runPipeline(makeConfig(), {
      http: site().http,
      translator: new FailingTranslator(),
    });

    expect(outputLines()).toEqual([
      HEADER,
      `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},`,
    ]);
    expect(summary.total_written).toBe(1);
    expect(summary.total_translated).toBe(0);
    expect(summary.failures).toEqual([
      {
        code: "12345",
        url: URL_12345,
        stage: "translate",
        error: "OpenAI API error: quota exceeded",
      },
    ]);
  });

  it("writes rows with an empty description when translation is disabled", async () => {
    writeCodes("12345");

    const summary = await runPipeline(makeConfig(), { http: site().http, translator: null });

    expect(outputLines()[1]).toBe(
      `12345,Screwdriver,https://cdn.shop.test/img/12345.jpg,${URL_12345},`
    );
    expect(summary.total_translated).toBe(0);
    expect(summary.failures).toEqual([]);
  });

  it("creates an input template and stops when the code list is missing", async () => {
    const { http, requested } = site();

    const summary = await runPipeline(makeConfig(), { http, translator: new FakeTranslator() });

    expect(summary.input_created).toBe(true);
    expect(fs.readFileSync(path.join(tmpDir, "codes.csv"), "utf-8")).toBe(INPUT_TEMPLATE);
    expect(requested).toEqual([]);
  });

  it("fails when the root sitemap cannot be fetched", async () => {
    writeCodes("12345");
    const { http } = site({ [ROOT]: { status: 404 } });

    await expect(
      runPipeline(makeConfig(), { http, translator: new FakeTranslator() })
    ).rejects.toBeInstanceOf(NetworkError);
  });
});
