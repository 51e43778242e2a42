import path from "node:path";
import type { ImageConfig } from "../../types/config.js";
import type { PublishedArtifact } from "../../types/run.js";
import type { TriggerDescriptor } from "../../types/trigger.js";
import type { ContainerRegistry } from "../../capabilities/registry.js";
import type { Logger } from "../../log/logger.js";

export const FLOATING_TAG = "latest";

export function imageName(image: ImageConfig): string {
  return `${image.registry}/${image.repository}`;
}

export type BuildStageInput = {
  trigger: TriggerDescriptor;
  image: ImageConfig;
  registry: ContainerRegistry;
  repoPath: string;
  logger: Logger;
  signal?: AbortSignal;
};

/**
 * Build-and-publish step. The commit tag is written at most once: when it
 * already exists the image is neither rebuilt nor pushed again. `latest` is
 * moved only after the commit tag resolves, in one registry write.
 */
export async function runBuildStage(input: BuildStageInput): Promise<PublishedArtifact> {
  const { trigger, image, registry, logger, signal } = input;
  const name = imageName(image);
  const uniqueRef = `${name}:${trigger.artifact_tag}`;
  const latestRef = `${name}:${FLOATING_TAG}`;

  await registry.authenticate(signal);

  let digest = await registry.resolveDigest(uniqueRef, signal);
  const reused = digest !== null;

  if (digest !== null) {
    logger.info("BUILD_REUSED", `${uniqueRef} already published (${digest}); not rebuilding`);
  } else {
    logger.info("BUILD_STARTED", `Building ${uniqueRef}`);
    digest = await registry.buildAndPush({
      context: path.resolve(input.repoPath, image.context),
      dockerfile: path.resolve(input.repoPath, image.context, image.dockerfile),
      ref: uniqueRef,
      cacheFrom: image.cache_from,
      cacheTo: image.cache_to,
      labels: {
        "org.opencontainers.image.revision": trigger.commit,
        ...(trigger.ref ? { "org.opencontainers.image.ref.name": trigger.ref } : {}),
      },
      signal,
    });
    logger.info("BUILD_PUSHED", `Pushed ${uniqueRef} (${digest})`);
  }

  await registry.pointTag(latestRef, `${name}@${digest}`, signal);
  logger.info("BUILD_TAGGED", `${latestRef} → ${digest}`);

  return {
    registry: image.registry,
    repository: image.repository,
    tag: trigger.artifact_tag,
    tags: [uniqueRef, latestRef],
    image: uniqueRef,
    digest,
    reused,
  };
}
