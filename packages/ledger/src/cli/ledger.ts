// packages/ledger/src/cli/ledger.ts
/* eslint-disable no-console */
import * as fs from "node:fs";

import { loadLedgerConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { HashChainLedger } from "../ledger.js";
import { openLedger } from "../ledger.js";
import type { ContentFieldInput } from "../record.js";
import { FieldValueSchema } from "../schema.js";
import { collect } from "../store-history.js";

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
  env?: Record<string, string | undefined>;
};

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function usage(): string {
  return [
    "Usage:",
    "  ledger append  <kind> [--key k] --actor a --field name=value [--field ...]",
    "  ledger verify  <kind> [--key k] [--from n] [--to n] [--anchor hash]",
    "  ledger history <kind> [--key k] [--actor a] [--limit n]",
    "  ledger export  <kind> [--key k] [--out file]",
    "  ledger streams",
    "",
    "Options:",
    "  --db <path>   SQLite file (default: LEDGER_DB_PATH or ledger.sqlite)",
    "",
    "Field values are parsed as JSON when they are valid JSON, otherwise kept as text.",
    "Exit codes: 0 ok, 1 usage or runtime error, 2 chain broken.",
    "",
  ].join("\n");
}

function valueAfter(args: string[], i: number, flag: string): string {
  const v = args[i + 1];
  if (v === undefined || v.startsWith("--")) throw new Error(`${flag} expects a value`);
  return v;
}

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  return i < 0 ? null : valueAfter(args, i, flag);
}

function getFlagValues(args: string[], flag: string): string[] {
  const out: string[] = [];
  args.forEach((a, i) => {
    if (a === flag) out.push(valueAfter(args, i, flag));
  });
  return out;
}

function getIntFlag(args: string[], flag: string): number | undefined {
  const raw = getFlagValue(args, flag);
  if (raw === null) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`${flag} expects an integer, got "${raw}"`);
  return n;
}

export function parseFieldArg(arg: string): ContentFieldInput {
  const eq = arg.indexOf("=");
  if (eq <= 0) throw new Error(`--field expects name=value, got "${arg}"`);

  const name = arg.slice(0, eq);
  const raw = arg.slice(eq + 1);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { name, value: raw };
  }

  const value = FieldValueSchema.safeParse(parsed);
  return { name, value: value.success ? value.data : raw };
}

function json(v: unknown): string {
  return JSON.stringify(v, null, 2) + "\n";
}

export async function run(argv: string[] = process.argv, io: CliIo = defaultIo): Promise<number> {
  const args = argv.slice(2);
  const cmd = args[0];

  if (!cmd || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return cmd ? 0 : 1;
  }

  const env = io.env ?? process.env;
  let ledger: HashChainLedger;
  try {
    const config = loadLedgerConfig({ ...env, LOG_LEVEL: env.LOG_LEVEL ?? "warn" });
    const dbPath = getFlagValue(args, "--db") ?? config.dbPath;
    ledger = openLedger({ ...config, dbPath });
  } catch (e) {
    io.err(`[ledger] ${errorMessage(e)}\n`);
    return 1;
  }

  try {
    if (cmd === "streams") {
      io.out(json(await ledger.streams()));
      return 0;
    }

    const kind = args[1];
    if (!kind || kind.startsWith("--")) {
      io.err("Missing stream kind.\n\n" + usage());
      return 1;
    }
    const key = getFlagValue(args, "--key");

    if (cmd === "append") {
      const actor = getFlagValue(args, "--actor");
      if (!actor) {
        io.err("Missing --actor <id>\n\n" + usage());
        return 1;
      }
      const fields = getFlagValues(args, "--field").map(parseFieldArg);
      io.out(json(await ledger.append(kind, key, fields, actor)));
      return 0;
    }

    if (cmd === "verify") {
      const report = await ledger.verify(kind, key, {
        from: getIntFlag(args, "--from"),
        to: getIntFlag(args, "--to"),
        anchor_hash: getFlagValue(args, "--anchor") ?? undefined,
      });
      io.out(json(report));
      return report.valid ? 0 : 2;
    }

    if (cmd === "history") {
      const records = await collect(
        ledger.history(kind, key, {
          actor: getFlagValue(args, "--actor") ?? undefined,
          limit: getIntFlag(args, "--limit"),
        })
      );
      io.out(json(records));
      return 0;
    }

    if (cmd === "export") {
      const bundle = await ledger.export(kind, key);
      const outFile = getFlagValue(args, "--out");
      if (outFile) {
        fs.writeFileSync(outFile, json(bundle), "utf8");
        io.out(json({ out: outFile, records: bundle.records.length, valid: bundle.integrity.valid }));
      } else {
        io.out(json(bundle));
      }
      return bundle.integrity.valid ? 0 : 2;
    }

    io.err(`Unknown command "${cmd}".\n\n` + usage());
    return 1;
  } catch (e) {
    io.err(`[ledger] ${errorMessage(e)}\n`);
    return 1;
  } finally {
    await ledger.close();
  }
}
