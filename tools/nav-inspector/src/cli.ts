/**
 * @navkit/tool-nav-inspector CLI
 *
 * Decodes a Source engine .nav file, prints a summary, answers ground height
 * queries and dumps the areas as JSON.
 *
 * Usage:
 *   npm run inspect:nav -- --input <file.nav> [--info] [--query x,y[,zHint]]... [--output <areas.json>]
 *
 * Options:
 *   --input              Path to the .nav file (required)
 *   --info               Print header, table sizes and index shape (default when nothing else is asked)
 *   --query              Ground height at x,y; the surface closest to zHint (default 0) wins. Repeatable.
 *   --output             Path for the JSON area dump
 *   --custom-area-bytes  Game-specific bytes after each area record (default 4)
 *   --leaf-capacity      Areas per quad-tree leaf before it splits (default 8)
 *   --max-depth          Deepest quad-tree level (default 10)
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadNavMesh } from '@navkit/nav-mesh';
import type { LoadOptions, NavMesh, SpatialIndex } from '@navkit/nav-mesh';

interface HeightQuery {
  x: number;
  y: number;
  zHint: number;
}

interface CliArgs {
  input?: string;
  output?: string;
  info: boolean;
  queries: HeightQuery[];
  load: LoadOptions;
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

function parseInteger(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n)) {
    throw new Error(`${flag} expects an integer, got "${value}"`);
  }
  return n;
}

function parseQuery(value: string): HeightQuery {
  const parts = value.split(',').map((part) => Number(part));
  const [x, y, zHint = 0] = parts;
  if (
    parts.length < 2 ||
    parts.length > 3 ||
    x === undefined ||
    y === undefined ||
    !parts.every((part) => Number.isFinite(part))
  ) {
    throw new Error(`--query expects x,y[,zHint], got "${value}"`);
  }
  return { x, y, zHint };
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { info: false, queries: [], load: {} };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = requireValue(argv, ++i, arg);
        break;
      case '--output':
        args.output = requireValue(argv, ++i, arg);
        break;
      case '--info':
        args.info = true;
        break;
      case '--query':
        args.queries.push(parseQuery(requireValue(argv, ++i, arg)));
        break;
      case '--custom-area-bytes':
        args.load.customAreaDataSize = parseInteger(requireValue(argv, ++i, arg), arg);
        break;
      case '--leaf-capacity':
        args.load.leafCapacity = parseInteger(requireValue(argv, ++i, arg), arg);
        break;
      case '--max-depth':
        args.load.maxDepth = parseInteger(requireValue(argv, ++i, arg), arg);
        break;
      default:
        // Skip unknown args
        break;
    }
  }

  return args;
}

function printUsage(): void {
  console.log('Usage: nav-inspector --input <file.nav> [--info] [--query x,y[,zHint]]... [--output <areas.json>]');
  console.log('');
  console.log('Options:');
  console.log('  --input              Path to the .nav file (required)');
  console.log('  --info               Print a summary of the mesh');
  console.log('  --query              Ground height at x,y closest to zHint (default 0), repeatable');
  console.log('  --output             Path for the JSON area dump');
  console.log('  --custom-area-bytes  Game-specific bytes after each area record (default 4)');
  console.log('  --leaf-capacity      Areas per quad-tree leaf before it splits (default 8)');
  console.log('  --max-depth          Deepest quad-tree level (default 10)');
}

/** Up to three decimals, without trailing zeros. */
function formatNumber(value: number): string {
  return String(Number(value.toFixed(3)));
}

function printInfo(mesh: NavMesh, index: SpatialIndex): void {
  const bounds = mesh.bounds();
  const stats = index.stats();
  console.log('--- Nav Mesh Info ---');
  console.log(`  Version: ${mesh.version} (sub-version ${mesh.subVersion})`);
  console.log(`  Analyzed: ${mesh.header.isAnalyzed ? 'yes' : 'no'}`);
  console.log(`  Areas: ${mesh.areaCount}`);
  console.log(`  Ladders: ${mesh.ladders.length}`);
  console.log(`  Places: ${mesh.places.length}`);
  if (bounds) {
    console.log(
      `  Bounds: (${formatNumber(bounds.minX)}, ${formatNumber(bounds.minY)}) - (${formatNumber(bounds.maxX)}, ${formatNumber(bounds.maxY)})`,
    );
  } else {
    console.log('  Bounds: empty');
  }
  console.log(`  Index: ${stats.nodes} nodes, ${stats.leaves} leaves, depth ${stats.depth}, ${stats.references} references`);
  console.log(`  Trailing bytes: ${mesh.header.trailingBytes}`);
}

function toJson(mesh: NavMesh): unknown {
  return {
    version: mesh.version,
    subVersion: mesh.subVersion,
    places: mesh.places,
    areas: mesh.areas.map((area) => ({
      id: area.id,
      flags: area.flags,
      corners: area.corners.map((corner) => corner.toArray()),
      connections: area.connections,
      place: mesh.getPlaceName(area) ?? null,
    })),
    ladders: mesh.ladders.map((ladder) => ({
      id: ladder.id,
      top: ladder.top.toArray(),
      bottom: ladder.bottom.toArray(),
      width: ladder.width,
      bottomAreaId: ladder.bottomAreaId,
    })),
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (!args.input) {
    printUsage();
    throw new Error('--input is required');
  }

  const inputPath = resolve(args.input);
  console.log(`Reading: ${inputPath}`);

  const { mesh, index } = loadNavMesh(await readFile(inputPath), args.load);

  if (args.info || (args.queries.length === 0 && !args.output)) {
    printInfo(mesh, index);
  }

  for (const { x, y, zHint } of args.queries) {
    const z = index.findBestHeight(x, y, zHint);
    console.log(`${formatNumber(x)} ${formatNumber(y)} -> ${z === undefined ? 'no match' : formatNumber(z)}`);
  }

  if (args.output) {
    const outputPath = resolve(args.output);
    const jsonStr = JSON.stringify(toJson(mesh), null, 2);
    await writeFile(outputPath, jsonStr, 'utf-8');
    console.log(`Written: ${outputPath} (${jsonStr.length} bytes)`);
  }
}

main().catch((err: unknown) => {
  console.error('nav-inspector error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
