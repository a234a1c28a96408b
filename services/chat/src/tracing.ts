import { createTracing } from "@docent/common";

export const { initTracing, getTracer, withSpan, _resetTracing } = createTracing("docent-chat");
