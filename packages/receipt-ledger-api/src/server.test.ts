import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { z } from "zod";

const RootManifestSchema = z.object({
  scripts: z.object({ start: z.string() }),
});

describe("server entry point", () => {
  it("is what the root start script runs", () => {
    const rootUrl = new URL("../../../", import.meta.url);
    const manifest = RootManifestSchema.parse(
      JSON.parse(readFileSync(new URL("package.json", rootUrl), "utf8")),
    );

    const entry = manifest.scripts.start.split(" ").at(-1) ?? "";
    expect(entry).toBe("packages/receipt-ledger-api/src/server.ts");
    expect(existsSync(fileURLToPath(new URL(entry, rootUrl)))).toBe(true);
  });
});
