import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, describe, expect, it } from "vitest";
import { ConfigError, ConfigErrorCode, normalizeConfig, runGenerate } from "@rpcforge/cli";

const here = dirname(fileURLToPath(import.meta.url));
const FIXTURE = join(here, "fixtures", "session.metamodel.json");

const root = mkdtempSync(join(tmpdir(), "rpcforge-generate-"));

afterAll(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("runGenerate", () => {
  it("writes the three modules and reports each one", () => {
    const outDir = join(root, "default");
    const lines: string[] = [];
    const written = runGenerate(normalizeConfig({ metamodel: FIXTURE, outDir }, root), {
      log: line => lines.push(line),
    });

    const expected = [join(outDir, "types.ts"), join(outDir, "initiator.ts"), join(outDir, "responder.ts")];
    expect(written).toEqual(expected);
    expect(lines).toEqual([
      "warning: Tree references Tree before it is defined (cycle: Tree)",
      ...expected.map(path => `wrote ${path}`),
    ]);
    for (const path of expected) {
      expect(existsSync(path)).toBe(true);
    }
  });

  it("routes each message to the role that receives it", () => {
    const outDir = join(root, "routing");
    runGenerate(normalizeConfig({ metamodel: FIXTURE, outDir }, root), { log: () => {} });

    const responder = readFileSync(join(outDir, "responder.ts"), "utf-8");
    const initiator = readFileSync(join(outDir, "initiator.ts"), "utf-8");

    expect(responder).toContain('"session/open": "handle_open_session",');
    expect(responder).toContain('"$/cancel": "handle_cancel",');
    expect(responder).not.toContain('"session/log": "handle_session_log"');
    expect(initiator).toContain('"session/log": "handle_session_log",');
    expect(initiator).toContain('"$/cancel": "handle_cancel",');
    expect(initiator).toContain('"session/open": "handle_open_session_result",');
  });

  it("honours custom file names and module specifiers", () => {
    const outDir = join(root, "custom");
    const written = runGenerate(
      normalizeConfig(
        {
          metamodel: FIXTURE,
          outDir,
          files: { types: "protocol/types.ts", responder: "server.ts" },
          runtimeModule: "./runtime.js",
          typesModule: "./protocol/types.js",
        },
        root,
      ),
      { log: () => {} },
    );

    expect(written).toEqual([
      join(outDir, "protocol", "types.ts"),
      join(outDir, "initiator.ts"),
      join(outDir, "server.ts"),
    ]);
    const server = readFileSync(join(outDir, "server.ts"), "utf-8");
    expect(server).toContain('import * as runtime from "./runtime.js";');
    expect(server).toContain('} from "./protocol/types.js";');
  });

  it("warns about forward references that close no cycle", () => {
    const metamodelPath = join(root, "forward.metamodel.json");
    writeFileSync(
      metamodelPath,
      JSON.stringify({
        metaData: { version: "0.9.0" },
        typeAliases: [
          { name: "Early", type: { kind: "reference", name: "Late" } },
          { name: "Late", type: { kind: "base", name: "string" } },
        ],
      }),
      "utf-8",
    );
    const outDir = join(root, "forward");
    const lines: string[] = [];
    runGenerate(
      normalizeConfig(
        { metamodel: metamodelPath, outDir, compiler: { forwardReferences: ["Late"], baseAliases: false } },
        root,
      ),
      { log: line => lines.push(line) },
    );

    expect(lines[0]).toBe("warning: Early references Late before it is defined (declared forward)");
    expect(lines).toHaveLength(4);
  });

  it("fails with MISSING_METAMODEL when no metamodel is configured", () => {
    let caught: unknown;
    try {
      runGenerate(normalizeConfig({}, root), { log: () => {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: ConfigErrorCode.MISSING_METAMODEL,
      message: 'No metamodel given: pass a path or set "metamodel" in rpcforge.config.json',
    });
  });
});
