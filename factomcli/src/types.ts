import { Flags } from "@oclif/core";
import type { ParamValue, RequestParams } from "factomjs";

const isParamValue = (value: unknown): value is ParamValue => {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (Array.isArray(value)) {
        return value.every(isParamValue);
      }
      return Object.values(value).every(isParamValue);
    default:
      return false;
  }
};

const isRequestParams = (value: unknown): value is RequestParams => {
  return value !== null && typeof value === "object" && !Array.isArray(value) && isParamValue(value);
};

/**
 * A block height range written as `<start>:<end>`.
 */
export const rangeFlag = Flags.custom<{ start: number; end: number }>({
  parse: async (input) => {
    const match = /^(\d+):(\d+)$/.exec(input);
    if (!match) {
      throw new Error(`Invalid range "${input}", expected <start>:<end>`);
    }
    const start = Number(match[1]);
    const end = Number(match[2]);
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      throw new Error(`Invalid range "${input}", heights must be safe integers`);
    }
    return { start, end };
  },
});

/**
 * Named request parameters written as a JSON object.
 */
export const paramsFlag = Flags.custom<RequestParams>({
  parse: async (input) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(input);
    } catch (error) {
      throw new Error(`Invalid params: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRequestParams(parsed)) {
      throw new Error("Invalid params: expected a JSON object");
    }
    return parsed;
  },
});
