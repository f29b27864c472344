#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { dumpConfig, loadConfig, type MapConfig } from "./config.js";
import { parseGraphml } from "./graphml_parse.js";
import { placeLabels } from "./label_placer.js";
import { LinkRouter, type RouteStats } from "./link_router.js";
import { renderSvg } from "./render_svg.js";
import { parseTopology } from "./topology_parse.js";
import { die, type Topology } from "./util.js";

const USAGE = "Usage: make-map [-c rules.yaml] [--dump-config] [--no-spread-links] [--orthogonal] [--verbose] [input [output]]";

export type CliOptions = {
  rulesPath?: string;
  dumpConfig: boolean;
  noSpreadLinks: boolean;
  orthogonal: boolean;
  verbose: boolean;
  help: boolean;
  input?: string;
  output?: string;
};

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { dumpConfig: false, noSpreadLinks: false, orthogonal: false, verbose: false, help: false };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-c":
      case "--config": {
        const next = argv[i + 1];
        if (next === undefined) die(`${arg} needs a file argument`);
        opts.rulesPath = next;
        i += 1;
        break;
      }
      case "--dump-config":
        opts.dumpConfig = true;
        break;
      case "--no-spread-links":
        opts.noSpreadLinks = true;
        break;
      case "--orthogonal":
        opts.orthogonal = true;
        break;
      case "-v":
      case "--verbose":
        opts.verbose = true;
        break;
      case "-h":
      case "--help":
        opts.help = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") die(`Unknown option '${arg}'`);
        positional.push(arg);
    }
  }
  if (positional.length > 2) die(`Too many arguments\n${USAGE}`);
  [opts.input, opts.output] = positional;
  return opts;
}

export function isGraphml(file: string | undefined): boolean {
  if (!file) return false;
  const ext = path.extname(file).toLowerCase();
  return ext === ".graphml" || ext === ".xml";
}

export type MapResult = {
  svg: string;
  stats: RouteStats;
};

// Routes, labels and draws an already decoded topology.
export function makeMap(topo: Topology, cfg: MapConfig): MapResult {
  const router = new LinkRouter(topo, cfg.router);
  const margin = cfg.router.extentsMargin;
  if (margin > 0) {
    const { min, max } = router.getExtents();
    router.setExtents(min.x - margin, min.y - margin, max.x + margin, max.y + margin);
  }
  const stats = router.routeLinks();
  placeLabels(topo);
  return { svg: renderSvg(topo, cfg.render), stats };
}

function readInput(file: string | undefined): string {
  if (!file || file === "-") return fs.readFileSync(0, "utf8");
  return fs.readFileSync(file, "utf8");
}

// Written next to the target and renamed, so a failed run leaves no half-written file.
function writeOutput(file: string | undefined, data: string): void {
  if (!file || file === "-") {
    process.stdout.write(data);
    return;
  }
  const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
  fs.writeFileSync(tmp, data, "utf8");
  fs.renameSync(tmp, file);
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  if (opts.help) {
    console.error(USAGE);
    return;
  }

  const cfg = loadConfig(opts.rulesPath);
  if (opts.noSpreadLinks) cfg.router.spreadLinks = false;
  if (opts.orthogonal) cfg.router.orthogonal = true;
  if (opts.dumpConfig) {
    process.stdout.write(dumpConfig(cfg));
    return;
  }

  const text = readInput(opts.input);
  const topo = isGraphml(opts.input) ? parseGraphml(text) : parseTopology(text);
  if (opts.verbose) console.error(`make-map: nodes=${topo.nodes.size} links=${topo.links.size}`);

  const { svg, stats } = makeMap(topo, cfg);
  if (opts.verbose) {
    console.error(`make-map: routed=${stats.routed.length} unrouted=${stats.unrouted.length} rounds=${stats.rounds}`);
    for (const id of stats.unrouted) console.error(`make-map: no route for link '${id}'`);
  }
  writeOutput(opts.output, svg);
}

// Installed as a bin the script is reached through a symlink.
const entry = process.argv[1];
const isMain = !!entry && fs.existsSync(entry) && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
if (isMain) {
  main().catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
