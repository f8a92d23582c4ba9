export class SuiteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SuiteError";
  }
}

export interface StackSource {
  /** `git+https://...@version` as written in the Containerfile. */
  gitUrl: string;
  repo: string;
  /** Version without a leading `v`, or `main`. */
  version: string;
  /** What to check out: `main`, or the `v`-prefixed release tag. */
  ref: string;
}

const GIT_URL = /git\+https:\/\/github\.com\/[^/\s]+\/llama-stack\.git@v?[0-9.+a-z]+/;

/** Finds the pinned llama-stack source in a Containerfile. */
export function parseStackSource(containerfile: string): StackSource {
  const match = GIT_URL.exec(containerfile);
  if (!match) {
    throw new SuiteError("Could not extract llama-stack git URL from Containerfile");
  }

  const gitUrl = match[0];
  const withoutPrefix = gitUrl.slice("git+".length);
  const at = withoutPrefix.indexOf("@");
  const repo = withoutPrefix.slice(0, at);
  const version = withoutPrefix.slice(at + 1).replace(/^v/, "");
  if (!version) {
    throw new SuiteError("Could not extract llama-stack version from Containerfile");
  }

  return { gitUrl, repo, version, ref: version === "main" ? "main" : `v${version}` };
}
