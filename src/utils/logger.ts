import winston from "winston";

const level = process.env.LOG_LEVEL || "info";

const lineFormat = winston.format.printf(
  ({ timestamp, level, message }) =>
    `[${timestamp}] ${level.toUpperCase()}: ${message}`,
);

// "silent" is not a winston level; treat it as a switch
const logger = winston.createLogger({
  level: level === "silent" ? "info" : level,
  silent: level === "silent",
  format: winston.format.combine(winston.format.timestamp(), lineFormat),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({
          format: "HH:mm:ss",
        }),
        lineFormat,
      ),
    }),
  ],
});

export default logger;
