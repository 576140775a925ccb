import type { LifecycleHook } from "@filegate/server"
import type { AppContext } from "../create-context"

/** Runs after the listener closed, so no request is still using the client. */
export function createStopHooks({ infra }: AppContext): LifecycleHook[] {
  const destroyS3Client: LifecycleHook = {
    name: "stop:s3-client",
    fn: async () => infra.s3Client.destroy(),
  }

  return [destroyS3Client]
}
