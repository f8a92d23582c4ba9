import { describe, it, expect } from "vitest";
import { parseStackSource, SuiteError } from "./source.js";

const containerfile = (spec: string) => `FROM registry.access.redhat.com/ubi9/python-312:latest
RUN pip install \\
    ${spec} \\
    sentence-transformers
`;

describe("parseStackSource", () => {
  it("extracts repo, version and release tag", () => {
    const source = parseStackSource(containerfile("git+https://github.com/example-org/llama-stack.git@v0.2.23"));

    expect(source).toEqual({
      gitUrl: "git+https://github.com/example-org/llama-stack.git@v0.2.23",
      repo: "https://github.com/example-org/llama-stack.git",
      version: "0.2.23",
      ref: "v0.2.23",
    });
  });

  it("accepts a version without the v prefix", () => {
    const source = parseStackSource(containerfile("git+https://github.com/example-org/llama-stack.git@0.3.0rc2+rhai0"));
    expect(source.version).toBe("0.3.0rc2+rhai0");
    expect(source.ref).toBe("v0.3.0rc2+rhai0");
  });

  it("checks out main as-is", () => {
    const source = parseStackSource(containerfile("git+https://github.com/example-org/llama-stack.git@main"));
    expect(source.version).toBe("main");
    expect(source.ref).toBe("main");
  });

  it("fails when the Containerfile pins no llama-stack git URL", () => {
    expect(() => parseStackSource(containerfile("llama-stack==0.2.23"))).toThrow(SuiteError);
    expect(() => parseStackSource("")).toThrow("Could not extract llama-stack git URL from Containerfile");
  });

  it("fails when the URL carries no version", () => {
    expect(() => parseStackSource(containerfile("git+https://github.com/example-org/llama-stack.git@v"))).toThrow(
      "Could not extract llama-stack version from Containerfile",
    );
  });
});
