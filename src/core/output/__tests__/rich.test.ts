import { describe, expect, it } from "vitest";
import { CliError } from "../../errors.js";
import { normalizeRichOutputFormat, renderRichOutput, resolveRichOutput } from "../rich.js";

describe("rich output", () => {
  it("normalizes formats and lets --json win", () => {
    expect(normalizeRichOutputFormat(undefined)).toBe("table");
    expect(normalizeRichOutputFormat(" TSV ")).toBe("tsv");
    expect(normalizeRichOutputFormat("table", true)).toBe("json");
    expect(() => normalizeRichOutputFormat("xml")).toThrow(
      new CliError("Invalid --format value: xml. Use table, tsv, or json.")
    );
  });

  it("refuses --out with table output", () => {
    expect(() => resolveRichOutput({ out: "result.txt" })).toThrow("`--out` requires --format tsv/json (or --json).");
    expect(resolveRichOutput({ out: "result.json", json: true })).toBe("json");
  });

  it("renders key/value records as TSV", () => {
    const rows = [
      { key: "listeners.tcp.default", value: "5672" },
      { key: "cluster_name", value: "my\tcluster" },
    ];
    expect(renderRichOutput(rows, "tsv")).toBe("key\tvalue\nlisteners.tcp.default\t5672\ncluster_name\tmy cluster\n");
  });

  it("renders a single object as key/value rows", () => {
    expect(renderRichOutput({ path: "/tmp/a.conf", updated: true }, "tsv")).toBe(
      "key\tvalue\npath\t/tmp/a.conf\nupdated\ttrue\n"
    );
  });

  it("renders JSON with a trailing newline", () => {
    expect(renderRichOutput({ key: "heartbeat", value: "60" }, "json")).toBe(
      '{\n  "key": "heartbeat",\n  "value": "60"\n}\n'
    );
  });
});
