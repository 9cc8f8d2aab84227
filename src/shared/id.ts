import { randomBytes } from "node:crypto";

export const createId = (prefix: string, at: number = Date.now()): string =>
  `${prefix}_${at.toString(36)}_${randomBytes(4).toString("hex")}`;

export const createTraceId = (): string => createId("trace");
