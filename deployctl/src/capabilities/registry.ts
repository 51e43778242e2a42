import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { runCommand, tail } from "../core/exec.js";

export type BuildRequest = {
  context: string;
  dockerfile: string;
  /** Fully qualified reference to push, e.g. ghcr.io/org/app:abc123. */
  ref: string;
  cacheFrom?: string;
  cacheTo?: string;
  labels?: Record<string, string>;
  signal?: AbortSignal;
};

/**
 * Container registry operations the build stage depends on.
 */
export interface ContainerRegistry {
  authenticate(signal?: AbortSignal): Promise<void>;
  /** Digest the reference currently resolves to, or null when the tag does not exist. */
  resolveDigest(ref: string, signal?: AbortSignal): Promise<string | null>;
  /** Build and push `ref`; resolves with the pushed manifest digest. */
  buildAndPush(request: BuildRequest): Promise<string>;
  /** Point tag `ref` at `source` (a digest reference) in a single registry write. */
  pointTag(ref: string, source: string, signal?: AbortSignal): Promise<void>;
}

const NOT_FOUND = /not found|manifest unknown|no such manifest|name unknown/i;

export type DockerRegistryOptions = {
  registry: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  username?: string;
  token?: string;
};

/** Registry backed by the docker CLI and buildx. */
export class DockerCliRegistry implements ContainerRegistry {
  constructor(private readonly opts: DockerRegistryOptions) {}

  async authenticate(signal?: AbortSignal): Promise<void> {
    const { username, token, registry } = this.opts;
    if (!username || !token) return;

    const res = await runCommand(["docker", "login", registry, "--username", username, "--password-stdin"], {
      cwd: this.opts.cwd,
      env: this.opts.env,
      signal,
      input: token,
    });
    if (res.exitCode !== 0) {
      throw new Error(`Registry login to ${registry} failed (exit ${res.exitCode}): ${tail(res.stderr, 5)}`);
    }
  }

  async resolveDigest(ref: string, signal?: AbortSignal): Promise<string | null> {
    const res = await runCommand(["docker", "buildx", "imagetools", "inspect", ref, "--format", "{{json .Manifest}}"], {
      cwd: this.opts.cwd,
      env: this.opts.env,
      signal,
    });
    if (res.exitCode !== 0) {
      if (NOT_FOUND.test(res.stderr)) return null;
      throw new Error(`Failed to inspect ${ref} (exit ${res.exitCode}): ${tail(res.stderr, 5)}`);
    }

    const manifest: unknown = JSON.parse(res.stdout);
    if (manifest && typeof manifest === "object" && "digest" in manifest && typeof manifest.digest === "string") {
      return manifest.digest;
    }
    throw new Error(`Registry returned no digest for ${ref}`);
  }

  async buildAndPush(request: BuildRequest): Promise<string> {
    const metaDir = fs.mkdtempSync(path.join(os.tmpdir(), "deployctl-build-"));
    const metaPath = path.join(metaDir, "metadata.json");
    try {
      const argv = ["docker", "buildx", "build", "--file", request.dockerfile, "--tag", request.ref, "--push"];
      argv.push("--metadata-file", metaPath);
      if (request.cacheFrom) argv.push("--cache-from", request.cacheFrom);
      if (request.cacheTo) argv.push("--cache-to", request.cacheTo);
      for (const [key, value] of Object.entries(request.labels ?? {})) argv.push("--label", `${key}=${value}`);
      argv.push(request.context);

      const res = await runCommand(argv, { cwd: this.opts.cwd, env: this.opts.env, signal: request.signal });
      if (res.exitCode !== 0) {
        throw new Error(`Image build failed (exit ${res.exitCode}): ${tail(res.stderr)}`);
      }

      const meta: unknown = JSON.parse(fs.readFileSync(metaPath, "utf8"));
      if (meta && typeof meta === "object" && "containerimage.digest" in meta) {
        const digest = meta["containerimage.digest"];
        if (typeof digest === "string") return digest;
      }
      throw new Error(`Build metadata for ${request.ref} has no image digest`);
    } finally {
      fs.rmSync(metaDir, { recursive: true, force: true });
    }
  }

  async pointTag(ref: string, source: string, signal?: AbortSignal): Promise<void> {
    const res = await runCommand(["docker", "buildx", "imagetools", "create", "--tag", ref, source], {
      cwd: this.opts.cwd,
      env: this.opts.env,
      signal,
    });
    if (res.exitCode !== 0) {
      throw new Error(`Failed to tag ${ref} (exit ${res.exitCode}): ${tail(res.stderr, 5)}`);
    }
  }
}
