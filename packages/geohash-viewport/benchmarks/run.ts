#!/usr/bin/env npx tsx
/**
 * Viewport engine benchmark over the in-memory Arrow store.
 *
 * Times table construction, index build and a sweep of viewport sizes from
 * street level to the whole world.
 * Run: npm run bench (from packages/geohash-viewport)
 */

import { ArrowPointStore, ViewportEngine, createPointTable, silentLogger } from "../src/index";
import type { BoundingBox } from "../src/index";
import { generateTestRecords } from "../tests/test-utils";
import {
  Colors,
  colorize,
  fmt,
  fmtKm2,
  fmtMs,
  header,
  sectionTitle,
  tableDivider,
  tableHeader,
  tableRow,
} from "./format";

const BASE_SIZES = [10_000, 50_000, 100_000];
const INCLUDE_500K = process.argv.includes("--500k");
const DATASET_SIZES = INCLUDE_500K ? [...BASE_SIZES, 500_000] : BASE_SIZES;
const WARMUP_RUNS = 3;
const BENCH_RUNS = 10;

/** Square viewports centred on (10, 10), from ~1 km² to the whole world. */
const VIEWPORT_DEGREES = [0.01, 0.1, 0.5, 2, 10, 60];

function viewport(deg: number): BoundingBox {
  const half = deg / 2;
  return { minLat: 10 - half, maxLat: 10 + half, minLng: 10 - half, maxLng: 10 + half };
}

const WORLD: BoundingBox = { minLat: -90, maxLat: 90, minLng: -180, maxLng: 180 };

interface TimingResult {
  median: number;
  p95: number;
}

function summarize(samples: number[]): TimingResult {
  samples.sort((a, b) => a - b);
  return {
    median: samples[Math.floor(samples.length / 2)],
    p95: samples[Math.floor(samples.length * 0.95)],
  };
}

function measure(fn: () => void): TimingResult {
  for (let i = 0; i < WARMUP_RUNS; i++) fn();
  const samples: number[] = [];
  for (let i = 0; i < BENCH_RUNS; i++) {
    const start = performance.now();
    fn();
    samples.push(performance.now() - start);
  }
  return summarize(samples);
}

async function measureAsync(fn: () => Promise<unknown>): Promise<TimingResult> {
  for (let i = 0; i < WARMUP_RUNS; i++) await fn();
  const samples: number[] = [];
  for (let i = 0; i < BENCH_RUNS; i++) {
    const start = performance.now();
    await fn();
    samples.push(performance.now() - start);
  }
  return summarize(samples);
}

async function main() {
  console.log("");
  header("geohash-viewport  ·  ArrowPointStore");
  console.log("");
  console.log(
    colorize(`  ├─ Dataset sizes:  ${DATASET_SIZES.map(fmt).join(", ")} points`, Colors.dim),
  );
  console.log(colorize(`  └─ Bench runs:     ${BENCH_RUNS} (${WARMUP_RUNS} warmup)`, Colors.dim));
  console.log("");

  sectionTitle("1", "Table and Index Build");
  console.log("");
  tableHeader(["Points", "Arrow table", "KDBush index"]);

  for (const size of DATASET_SIZES) {
    const records = generateTestRecords(size);
    const tableTime = measure(() => {
      createPointTable(records);
    });
    const table = createPointTable(records);
    const indexTime = measure(() => {
      new ArrowPointStore(table);
    });
    tableRow([fmt(size), fmtMs(tableTime.median), fmtMs(indexTime.median)]);
  }
  tableDivider();
  console.log("");

  sectionTitle("2", "Viewport Queries");

  for (const size of DATASET_SIZES) {
    console.log("");
    console.log(colorize(`  ${fmt(size)} points`, Colors.cyan));
    console.log("");
    tableHeader(["Viewport", "Area", "Result", "Median", "p95", "Rows"]);

    const engine = new ViewportEngine(ArrowPointStore.fromRecords(generateTestRecords(size)), {
      logger: silentLogger,
    });

    const boxes: [string, BoundingBox][] = [
      ...VIEWPORT_DEGREES.map((deg): [string, BoundingBox] => [`${deg}°`, viewport(deg)]),
      ["world", WORLD],
    ];
    for (const [name, box] of boxes) {
      const result = await engine.query(box);
      const timing = await measureAsync(() => engine.query(box));
      const label =
        result.kind === "aggregated" ? `clusters/${result.precision}` : "points";
      tableRow([
        name,
        fmtKm2(result.areaKm2),
        label,
        fmtMs(timing.median),
        fmtMs(timing.p95),
        fmt(result.rows.length),
      ]);
    }
    tableDivider();
  }
  console.log("");
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
