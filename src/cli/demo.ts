#!/usr/bin/env tsx
/**
 * CLI: demo
 *
 * Usage: npm run demo [-- --format json]
 *
 * Runs every reduction over a fixed set of inputs and prints the
 * results, followed by the inputs each reduction refuses.
 */

import path from "path";
import { fileURLToPath } from "url";
import {
  attempt,
  float64,
  max,
  maxOf,
  mean,
  meanOf,
  reduceArguments,
  sum,
  sumOf,
  transformReduce,
  variance,
  varianceOf,
} from "../numeric/index.js";
import type { Reduction } from "../numeric/index.js";
import { loadRunConfig } from "../shared/run_config.js";
import type { OutputFormat } from "../shared/run_config.js";

export interface DemoCase {
  label: string;
  result: Reduction<unknown>;
}

export interface DemoSection {
  title: string;
  cases: DemoCase[];
}

const run = (label: string, reduce: () => unknown): DemoCase => ({
  label,
  result: attempt(reduce),
});

/** Values the type checker would refuse, as an untyped caller would pass them. */
const TEXT: readonly unknown[] = ["a", "bb"];

export function runDemo(): DemoSection[] {
  const ints = Int32Array.of(1, 2, 3, 4);

  return [
    {
      title: "sum",
      cases: [
        run("[1, 2, 3, 4]", () => sum([1, 2, 3, 4])),
        run("[1.5, 2.0, 0.5]", () => sum([1.5, 2.0, 0.5])),
      ],
    },
    {
      title: "mean",
      cases: [
        run("Int32Array [1, 2, 3, 4]", () => mean(ints)),
        run("[1, 2, 3, 4]", () => mean([1, 2, 3, 4])),
      ],
    },
    {
      title: "variance",
      cases: [
        run("Int32Array [1, 2, 3, 4]", () => variance(ints)),
        run("[1, 2, 3, 4]", () => variance([1, 2, 3, 4])),
      ],
    },
    {
      title: "max",
      cases: [
        run("Int32Array [3, 9, 2, 7]", () => max(Int32Array.of(3, 9, 2, 7))),
        run("[1.2, 4.8, 3.1]", () => max([1.2, 4.8, 3.1])),
      ],
    },
    {
      title: "transformReduce",
      cases: [
        run("[1, 2, 3], x => x * x", () => transformReduce([1, 2, 3], (x) => x * x)),
        run("Int32Array [1, 2, 3], x => x + 10", () =>
          transformReduce(Int32Array.of(1, 2, 3), (x) => x + 10),
        ),
      ],
    },
    {
      title: "sumOf",
      cases: [
        run("(1, 2, 33, 4)", () => sumOf(1, 2, 33, 4)),
        run("(0.5, 1, 2.5)", () => sumOf(0.5, 1, 2.5)),
      ],
    },
    {
      title: "meanOf",
      cases: [
        run("(0.1, 2, 3, 4)", () => meanOf(0.1, 2, 3, 4)),
        run("(1, 2, 3, 4)", () => meanOf(1, 2, 3, 4)),
      ],
    },
    {
      title: "varianceOf",
      cases: [
        run("(1, 2, 3, 4)", () => varianceOf(1, 2, 3, 4)),
        run("(0.1, 2, 3, 4)", () => varianceOf(0.1, 2, 3, 4)),
      ],
    },
    {
      title: "maxOf",
      cases: [
        run("(1, 2.7, 3, 4)", () => maxOf(1, 2.7, 3, 4)),
        run("(1, 2, 33, 4)", () => maxOf(1, 2, 33, 4)),
      ],
    },
    {
      title: "rejected",
      cases: [
        run('sum ["a", "bb"]', () => sum<unknown>(TEXT, float64)),
        run('mean ["a", "bb"]', () => mean<unknown>(TEXT, float64)),
        run('max ["a", "bb"]', () => max<unknown>(TEXT, float64)),
        run("mean []", () => mean([])),
        run("transformReduce [1, 2, 3], x => ({ v: x })", () =>
          transformReduce<number, unknown>([1, 2, 3], (x) => ({ v: x }), float64),
        ),
        run('sumOf ("a", "b")', () => reduceArguments("sumOf", ["a", "b"])),
        run("varianceOf ('a', 'b', 'c')", () => reduceArguments("varianceOf", ["a", "b", "c"])),
      ],
    },
  ];
}

export function formatValue(value: unknown): string {
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}

function formatCase(entry: DemoCase): string {
  if (entry.result.success) return `  ${entry.label} = ${formatValue(entry.result.value)}`;
  return `  ${entry.label} -> ${entry.result.error.code}: ${entry.result.error.message}`;
}

export function renderDemo(sections: DemoSection[], format: OutputFormat): string {
  if (format === "json") {
    const payload = sections.map((section) => ({
      title: section.title,
      cases: section.cases.map((entry) =>
        entry.result.success
          ? { label: entry.label, value: formatValue(entry.result.value) }
          : { label: entry.label, error: entry.result.error.code, message: entry.result.error.message },
      ),
    }));
    return JSON.stringify(payload, null, 2);
  }

  return sections
    .map((section) => [`Testing ${section.title}:`, ...section.cases.map(formatCase)].join("\n"))
    .join(`\n${"-".repeat(44)}\n`);
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) ===
    path.resolve(fileURLToPath(import.meta.url))
) {
  const config = loadRunConfig(process.argv.slice(2));
  try {
    console.log(renderDemo(runDemo(), config.format));
  } catch (error) {
    console.error(`Demo failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
