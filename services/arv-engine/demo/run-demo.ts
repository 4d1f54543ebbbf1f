/**
 * ARV Engine Demo Script
 *
 * Run with: npx tsx demo/run-demo.ts
 */

import { ArvEngine, createSummaryReport, formatCurrency } from "../src/index.js";
import type { ArvEngineInputs } from "../src/index.js";

const harborRoadInputs: ArvEngineInputs = {
  contract: {
    contract_version: "ARV_ENGINE_V0",
    engine_version: "0.1.0",
  },
  analysis: {
    as_of_date: "2026-10-01",
    purchase_price: 85000,
  },
  subject: {
    id: "subject-harbor-77",
    address: "77 Harbor Rd",
    latitude: 41.5,
    longitude: -81.7,
    bedrooms: 3,
    bathrooms: 1,
    square_footage: 1500,
    year_built: 1956,
    condition: "fair",
    features: ["basement"],
  },
  comparables: [
    {
      id: "comp-dock-5",
      address: "5 Dock St",
      latitude: 41.505,
      longitude: -81.7,
      bedrooms: 3,
      bathrooms: 1,
      square_footage: 1450,
      year_built: 1958,
      condition: "good",
      sale_price: 253750,
      sale_date: "2026-09-12",
    },
    {
      id: "comp-mast-19",
      address: "19 Mast Ave",
      latitude: 41.495,
      longitude: -81.7,
      bedrooms: 3,
      bathrooms: 1.5,
      square_footage: 1550,
      year_built: 1955,
      condition: "good",
      sale_price: 263500,
      sale_date: "2026-08-28",
    },
    {
      id: "comp-keel-2",
      address: "2 Keel Ct",
      latitude: 41.5,
      longitude: -81.708,
      bedrooms: 3,
      bathrooms: 1,
      square_footage: 1500,
      year_built: 1960,
      condition: "average",
      sale_price: 255000,
      sale_date: "2026-09-20",
    },
    {
      id: "comp-sail-40",
      address: "40 Sail Ln",
      latitude: 41.5,
      longitude: -81.692,
      bedrooms: 2,
      bathrooms: 1,
      square_footage: 1400,
      year_built: 1952,
      condition: "good",
      sale_price: 245000,
      sale_date: "2026-07-15",
    },
    {
      id: "comp-buoy-11",
      address: "11 Buoy Pl",
      latitude: 41.51,
      longitude: -81.7,
      bedrooms: 3,
      bathrooms: 2,
      square_footage: 1600,
      year_built: 1962,
      condition: "excellent",
      sale_price: 272000,
      sale_date: "2026-08-05",
    },
  ],
  renovation: {
    contingency_rate: 0.1,
    line_items: [
      { item: "roof", grade: "asphalt" },
      { item: "hvac", grade: "replace" },
      { item: "bathroom", grade: "basic", quantity: 1 },
    ],
  },
};

function main(): void {
  console.log("ARV Engine Demo");
  console.log("===============\n");

  const engine = new ArvEngine();

  console.log("Running ARV analysis...\n");
  const result = engine.run(harborRoadInputs);

  if (!result.success) {
    console.error("ARV analysis failed:");
    result.errors?.forEach((e) => console.error(`  - ${e}`));
    process.exit(1);
  }

  console.log(createSummaryReport(result));

  console.log("\nSELECTED COMPARABLES");
  console.log("-".repeat(60));
  for (const comp of result.comparables?.comparableSet.comps ?? []) {
    const ppsf = comp.sale.salePrice / comp.sale.squareFootage;
    console.log(
      `${comp.sale.id}: ${comp.distanceMiles.toFixed(2)} mi | ${comp.sale.saleDate} | ${formatCurrency(ppsf)}/sqft | weight ${comp.weight.toFixed(3)}`,
    );
  }

  console.log("\nRENOVATION BY CATEGORY");
  console.log("-".repeat(60));
  for (const [category, cost] of Object.entries(result.renovation?.categories ?? {})) {
    console.log(`${category}: ${formatCurrency(cost)}`);
  }
}

main();
