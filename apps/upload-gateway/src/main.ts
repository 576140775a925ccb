#!/usr/bin/env tsx
import { createPinoLogger } from "@filegate/logger"
import { Command } from "commander"
import { DEFAULT_CONFIG_FILE } from "./app/config"
import { run } from "./server"

type CliOptions = {
  config: string
}

const program = new Command()
  .name("filegate")
  .description("Upload gateway for XMPP HTTP File Upload backed by S3-compatible storage")
  .option("-c, --config <path>", "path to the TOML configuration file", DEFAULT_CONFIG_FILE)

program.parse()

const { config } = program.opts<CliOptions>()

run({ configFile: config }).catch((err: unknown) => {
  createPinoLogger().fatal("Startup failed", { err })
  process.exit(1)
})
