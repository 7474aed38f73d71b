import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Environment } from "../../core/environment";
import { RenderError, TypeMismatchError } from "../../core/errors";
import {
  type Value,
  artifactValue,
  integerValue,
  listValue,
  stringValue,
  structValue,
} from "../../core/values";
import { TemplateDriver } from "../../execution/templates";

describe("TemplateDriver", () => {
  let dir: string;
  let driver: TemplateDriver;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "procbed-templates-"));
    await mkdir(join(dir, "tpl"));
    driver = new TemplateDriver({
      outputDir: join(dir, "out"),
      searchPaths: [join(dir, "tpl"), dir],
    });
  });

  afterEach(async () => {
    await rm(dir, { force: true, recursive: true });
  });

  describe("build", () => {
    let env: Environment;

    beforeEach(() => {
      env = new Environment();
      env.declare("port", integerValue(8080));
      env.declare(
        "node",
        structValue("alpha", new Map([["role", stringValue("main")]]))
      );
      env.declare("ports", listValue([integerValue(1), integerValue(2)]));
    });

    it("renders visible bindings and writes the output", async () => {
      await writeFile(
        join(dir, "tpl", "server.tpl"),
        "{{= node }}:{{= port }} role={{= node.role }} first={{= ports[0] }}\n"
      );
      const properties = new Map<string, Value>([["id", integerValue(1)]]);

      const artifact = await driver.build(
        { output: "a/server.conf", properties, template: "server.tpl" },
        env
      );

      expect(artifact).toEqual(
        artifactValue(
          join(dir, "tpl", "server.tpl"),
          join(dir, "out", "a", "server.conf"),
          new Map([["id", integerValue(1)]])
        )
      );
      expect(await readFile(artifact.outputPath, "utf8")).toBe(
        "alpha:8080 role=main first=1\n"
      );
    });

    it("copies properties so later changes do not leak in", async () => {
      await writeFile(join(dir, "plain.tpl"), "static\n");
      const tags = listValue([stringValue("a")]);
      const properties = new Map<string, Value>([["tags", tags]]);

      const artifact = await driver.build(
        { output: "plain.txt", properties, template: "plain.tpl" },
        env
      );
      tags.items.push(stringValue("b"));

      expect(artifact.sourcePath).toBe(join(dir, "plain.tpl"));
      expect(artifact.properties.get("tags")).toEqual(
        listValue([stringValue("a")])
      );
    });

    it("shadows outer bindings with inner ones", async () => {
      await writeFile(join(dir, "tpl", "port.tpl"), "{{= port }}");
      const inner = env.child();
      inner.declare("port", integerValue(9090));

      const artifact = await driver.build(
        { output: "port.txt", properties: new Map(), template: "port.tpl" },
        inner
      );

      expect(await readFile(artifact.outputPath, "utf8")).toBe("9090");
    });

    it("reports missing templates with the search paths", async () => {
      await expect(
        driver.build(
          { output: "x", properties: new Map(), template: "nope.tpl" },
          env
        )
      ).rejects.toThrow(
        `Template \`nope.tpl\` not found in ${join(dir, "tpl")}, ${dir}`
      );
    });

    it("includes partials found anywhere on the search path", async () => {
      await writeFile(join(dir, "tpl", "part.tpl"), "port={{= port }}");
      await writeFile(
        join(dir, "host.tpl"),
        '[{{~ include("part.tpl", it) }}]\n'
      );

      const artifact = await driver.build(
        { output: "host.txt", properties: new Map(), template: "host.tpl" },
        env
      );

      expect(await readFile(artifact.outputPath, "utf8")).toBe(
        "[port=8080]\n"
      );
    });

    it("reports partials missing from the search path", async () => {
      await writeFile(join(dir, "host.tpl"), '{{~ include("gone.tpl") }}');

      await expect(
        driver.build(
          { output: "host.txt", properties: new Map(), template: "host.tpl" },
          env
        )
      ).rejects.toThrow(
        `Template \`host.tpl\` -> \`host.txt\` failed to render: Template \`gone.tpl\` not found in ${join(dir, "tpl")}, ${dir}`
      );
    });

    it("wraps render failures", async () => {
      await writeFile(join(dir, "tpl", "bad.tpl"), "{{= missing.field }}");

      const failure = driver.build(
        { output: "bad.txt", properties: new Map(), template: "bad.tpl" },
        env
      );

      await expect(failure).rejects.toBeInstanceOf(RenderError);
      await expect(failure).rejects.toThrow(
        "Template `bad.tpl` -> `bad.txt` failed to render"
      );
    });
  });

  describe("yielded artifacts", () => {
    it("collects yields per block in order", () => {
      const first = artifactValue("/t/a", "/o/1");
      const second = artifactValue("/t/a", "/o/2");

      driver.begin("configs");
      driver.yield(first);
      driver.yield(second);

      expect(driver.end()).toEqual([first, second]);
      expect(driver.registry().get("configs")).toEqual([first, second]);
    });

    it("returns an empty list for a block that yields nothing", () => {
      driver.begin("empty");
      expect(driver.end()).toEqual([]);
    });

    it("only accepts artifacts", () => {
      driver.begin("configs");
      expect(() => driver.yield(stringValue("x"))).toThrow(
        new TypeMismatchError(
          "Only build() artifacts can be yielded, found a string"
        )
      );
    });

    it("rejects yields outside a block", () => {
      expect(() => driver.yield(artifactValue("/t", "/o"))).toThrow(
        "yield is only valid inside a template block"
      );
    });
  });
});
