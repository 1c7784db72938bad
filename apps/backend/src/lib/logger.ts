import pino from "pino"

const isProduction = process.env.NODE_ENV === "production"
const isTest = process.env.NODE_ENV === "test"
const logFile = process.env.LOG_FILE
const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname",
  },
}

const baseOptions = {
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
}

export const logger = (() => {
  const usePretty = !isProduction && !isTest

  if (!logFile) {
    return pino({
      ...baseOptions,
      transport: usePretty ? prettyTransport : undefined,
    })
  }

  const primaryStream = usePretty ? pino.transport(prettyTransport) : process.stdout
  const fileStream = pino.destination({
    dest: logFile,
    mkdir: true,
    sync: false,
  })

  return pino(baseOptions, pino.multistream([{ stream: primaryStream }, { stream: fileStream }]))
})()
