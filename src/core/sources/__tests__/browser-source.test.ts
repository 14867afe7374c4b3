import { beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkError, ParseError } from "../../errors/index";
import { BrowserFetchSource } from "../browser-source";
import { CATALOG_HTML, CATALOG_PRICES } from "../../__tests__/fixtures";

const pw = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock("playwright", () => ({ chromium: { launch: pw.launch } }));

function fakeBrowser(html = CATALOG_HTML) {
  const page = {
    route: vi.fn().mockResolvedValue(undefined),
    goto: vi.fn().mockResolvedValue(null),
    waitForSelector: vi.fn().mockResolvedValue(null),
    content: vi.fn().mockResolvedValue(html),
  };
  const context = {
    newPage: vi.fn().mockResolvedValue(page),
    clearCookies: vi.fn().mockResolvedValue(undefined),
  };
  const browser = {
    newContext: vi.fn().mockResolvedValue(context),
    close: vi.fn().mockResolvedValue(undefined),
  };
  pw.launch.mockResolvedValue(browser);
  return { browser, context, page };
}

const PAGE_URL = "https://wiki.test/Weapon_Skins";

describe("BrowserFetchSource", () => {
  beforeEach(() => {
    pw.launch.mockReset();
  });

  it("renders the page and extracts prices", async () => {
    const { browser, page } = fakeBrowser();
    const source = new BrowserFetchSource({
      url: PAGE_URL,
      navigationTimeoutMs: 5000,
      selectorTimeoutMs: 2000,
    });

    await expect(source.fetchPrices()).resolves.toEqual(CATALOG_PRICES);

    expect(pw.launch).toHaveBeenCalledWith(expect.objectContaining({ headless: true }));
    expect(page.goto).toHaveBeenCalledWith(PAGE_URL, { waitUntil: "networkidle", timeout: 5000 });
    expect(page.waitForSelector).toHaveBeenCalledWith("table.wikitable.sortable", {
      timeout: 2000,
    });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("reports navigation failures as NetworkError and closes the browser", async () => {
    const { browser, page } = fakeBrowser();
    page.goto.mockRejectedValue(new Error("net::ERR_NAME_NOT_RESOLVED"));

    const source = new BrowserFetchSource({ url: PAGE_URL });
    await expect(source.fetchMarkup()).rejects.toBeInstanceOf(NetworkError);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("reports a missing table as ParseError", async () => {
    const { page } = fakeBrowser();
    page.waitForSelector.mockRejectedValue(new Error("Timeout 2000ms exceeded"));

    const source = new BrowserFetchSource({ url: PAGE_URL, selectorTimeoutMs: 2000 });
    await expect(source.fetchMarkup()).rejects.toThrow(
      new ParseError("Catalog table did not appear within 2000ms"),
    );
  });

  it("wraps launch failures", async () => {
    pw.launch.mockRejectedValue(new Error("Executable doesn't exist"));
    const source = new BrowserFetchSource({ url: PAGE_URL });
    await expect(source.fetchMarkup()).rejects.toThrow(
      "Could not launch browser: Executable doesn't exist",
    );
  });

  it("keeps one browser open for a whole session", async () => {
    const { browser, context, page } = fakeBrowser();
    const source = new BrowserFetchSource({ url: PAGE_URL });

    await source.withSession(async () => {
      await source.fetchMarkup();
      await source.resetSession();
      await source.fetchMarkup();
    });

    expect(pw.launch).toHaveBeenCalledTimes(1);
    expect(page.goto).toHaveBeenCalledTimes(2);
    expect(context.clearCookies).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
