import { version } from "../version.js";

const isValidHttpHeaders = (headers: unknown): headers is Record<string, string> => {
  if (headers === null || typeof headers !== "object" || Array.isArray(headers)) {
    throw new Error("Invalid headers provided.");
  }

  const isValidObj = Object.entries(headers).every(
    ([key, value]) => typeof key === "string" && typeof value === "string",
  );

  if (!isValidObj) {
    throw new Error("Invalid http headers provided.");
  }

  return true;
};

const requestHeadersWithDefaults = (headers: Record<string, string> = {}) => {
  isValidHttpHeaders(headers);

  const defaultHeaders = {
    "Client-Version": `factomjs/${version}`,
    "Content-Type": "application/json",
    Accept: "application/json",
  };

  return { ...defaultHeaders, ...headers };
};

export { isValidHttpHeaders, requestHeadersWithDefaults };
