import "dotenv/config";
import { AppConfig } from "./core/config/index";
import { ExhaustionError, toError } from "./core/errors/index";
import { describeTables } from "./core/extraction/index";
import { type PricingContext, createPricingContext } from "./core/services/index";
import { formatDuration } from "./core/utils/date";
import { Logger } from "./core/utils/logger";

const USAGE = `Usage:
npm run cli -- [--currency <name>] [--store-price] [--refresh] [--refresh-rates]
npm run cli -- --stats | --verify | --inspect | --status | --list

Options:
  --currency       Display currency (default: ${AppConfig.DEFAULT_CURRENCY})
  --store-price    Convert at regional store bundle prices instead of exchange rates
  --refresh        Drop the cached catalog total before fetching
  --refresh-rates  Drop the cached exchange rates before converting
  --stats          Print price statistics from a fresh fetch
  --verify         Print the extraction quality report
  --inspect        Print the layout of every catalog table on the page
  --status         Print the age of the cached catalog total
  --list           List available currencies

Examples:
  npm run cli -- --currency "Euro (€)"
  npm run cli -- --refresh --verify`;

async function printTotal(ctx: PricingContext, currency: string, storePrice: boolean) {
  let total = 0;
  let degraded = false;
  try {
    total = await ctx.catalog.getTotal();
  } catch (error) {
    if (!(error instanceof ExhaustionError)) throw error;
    Logger.error("Could not fetch skin prices", error, {
      failures: error.failures.map((f) => f.message),
    });
    degraded = true;
  }

  const amount = storePrice
    ? ctx.converter.convertAtStorePrice(total, currency)
    : await ctx.converter.convert(total, currency);
  console.log(`Current Amount for Skins: ${amount} (${total.toLocaleString("en-US")} VP)`);
  return degraded ? 1 : 0;
}

async function printStats(ctx: PricingContext) {
  const s = await ctx.catalog.getStatistics();
  console.log(
    [
      `Total Skins: ${s.count.toLocaleString("en-US")}`,
      `Total Price: ${s.total.toLocaleString("en-US")} VP`,
      `Average Price: ${Math.round(s.average).toLocaleString("en-US")} VP`,
      `Min Price: ${s.min.toLocaleString("en-US")} VP`,
      `Max Price: ${s.max.toLocaleString("en-US")} VP`,
      `Price Range: ${s.range.toLocaleString("en-US")} VP`,
    ].join("\n"),
  );
  return 0;
}

async function printReport(ctx: PricingContext) {
  const report = ctx.verifier.verify(await ctx.sourceManager.getMarkup());
  console.log(ctx.verifier.renderReport(report));
  return report.error ? 1 : 0;
}

async function printTables(ctx: PricingContext) {
  const tables = describeTables(await ctx.sourceManager.getMarkup());
  console.log(`Found ${tables.length} catalog tables`);
  for (const t of tables) {
    console.log(
      `Table ${t.index + 1}: ${t.dataRowCount} data rows, ${t.markedRowCount} with marked prices`,
    );
    console.log(`   Headers: ${t.headers.join(" | ")}`);
    if (t.sampleMarkedPrices.length) {
      console.log(`   Sample prices: ${t.sampleMarkedPrices.join(", ")}`);
    }
  }
  return 0;
}

async function printStatus(ctx: PricingContext) {
  const status = await ctx.catalog.cacheStatus();
  if (!status) {
    console.log("No cached catalog total");
    return 0;
  }
  console.log(
    `Cached at ${status.capturedAt.toISOString()} (${formatDuration(status.ageMs / 1000)} ago, ${status.fresh ? "fresh" : "expired"})`,
  );
  return 0;
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help")) {
    console.log(USAGE);
    return 0;
  }

  const ctx = createPricingContext();

  if (hasFlag("--list")) {
    console.log(ctx.converter.listCurrencies().join("\n"));
    return 0;
  }

  if (hasFlag("--refresh")) await ctx.catalog.refreshCache();
  if (hasFlag("--refresh-rates")) await ctx.fxRates.refresh();

  if (hasFlag("--status")) return printStatus(ctx);
  if (hasFlag("--inspect")) return printTables(ctx);
  if (hasFlag("--verify")) return printReport(ctx);
  if (hasFlag("--stats")) return printStats(ctx);

  return printTotal(
    ctx,
    getArg("--currency") ?? AppConfig.DEFAULT_CURRENCY,
    hasFlag("--store-price"),
  );
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    Logger.error("Command failed", toError(e));
    process.exitCode = 1;
  });
