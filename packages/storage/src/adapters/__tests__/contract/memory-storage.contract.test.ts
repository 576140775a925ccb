import { FakeClock } from "@filegate/clock"
import { describeStorageContractTests } from "../../../ports/__tests__/storage.contract"
import { MemoryStorage } from "../../memory-storage"

describeStorageContractTests("Memory", async () => {
  const bucket = "test-bucket"
  const storage = new MemoryStorage({ clock: new FakeClock(0), buckets: [bucket] })

  return { bucket, storage }
})
