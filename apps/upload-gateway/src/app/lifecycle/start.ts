import type { LifecycleHook } from "@filegate/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { logger } = context.services.core
  const { fileStore } = context.services.files

  return [
    {
      name: "start:storage:bucket",
      fn: async () => {
        const exists = await fileStore.exists()

        if (exists) {
          logger.info("Bucket found", { bucket: fileStore.bucket })
          return
        }

        // Some providers report existing buckets as missing.
        logger.warn("Bucket does not exist (or the S3 service misreports it)", {
          bucket: fileStore.bucket,
        })
      },
    },
  ]
}
