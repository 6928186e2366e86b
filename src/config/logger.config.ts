import type { Params } from "nestjs-pino"

/**
 * nestjs-pino settings shared by the API and worker processes
 */
export function loggerParams(context: string): Params {
  return {
    pinoHttp: {
      transport:
        process.env.NODE_ENV?.toLowerCase() === "production"
          ? undefined
          : {
              target: "pino-pretty",
              options: {
                singleLine: true,
                translateTime: "dd/mm/yyyy HH:MM:ss",
              },
            },
      customProps: () => ({
        context,
      }),
    },
  }
}
