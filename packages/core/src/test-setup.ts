import fs from "node:fs"
import stream from "node:stream"
import { configure, getConsoleSink, getStreamSink } from "@logtape/logtape"
import { getJsonLinesFormatter } from "./utils/get-json-lines-formatter.js"

const LOG_PIPE_PATH = "./log.jsonl"

const logPipeStream = fs.createWriteStream(LOG_PIPE_PATH, { flags: "w" })

// Configure LogTape for tests
await configure({
  reset: true,
  sinks: {
    console: getConsoleSink(),
    file: getStreamSink(stream.Writable.toWeb(logPipeStream), {
      formatter: getJsonLinesFormatter(),
    }),
  },
  loggers: [
    {
      category: ["spindle"],
      lowestLevel: "debug",
      sinks: ["file"],
      filters: ["loop"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],

  filters: {
    loop: record => {
      const message = record.message[0]
      if (!message || typeof message !== "string") return false
      return (
        message.startsWith("loop/") ||
        message.startsWith("relay/") ||
        message.startsWith("ui/") ||
        record.properties.debug === true
      )
    },
  },
})
