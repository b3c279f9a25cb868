import { pino } from "pino";
import pinoPretty from "pino-pretty";

const prettyTransport = pinoPretty({
  colorize: true,
  translateTime: true,
  destination: 2,
});

const logger = pino({ level: "warn" }, prettyTransport);

export default logger;
