import { trace, SpanStatusCode } from "@opentelemetry/api";

const tracer = trace.getTracer("stepwise-translator");

/**
 * Wrap an async operation in a span
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: () => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : "Unknown error",
      });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Wrap a model completion call
 */
export async function tracedCompletion<T>(
  provider: string,
  model: string,
  inputLength: number,
  completionFn: () => Promise<T>
): Promise<T> {
  return withSpan(
    "llm.completion",
    {
      "ai.provider": provider,
      "ai.model": model,
      "ai.input_length": inputLength,
    },
    completionFn
  );
}

/**
 * Wrap one translation batch, including retries
 */
export async function tracedBatch<T>(
  itemCount: number,
  sourceLanguage: string,
  targetLanguage: string,
  batchFn: () => Promise<T>
): Promise<T> {
  return withSpan(
    "translation.batch",
    {
      "translation.item_count": itemCount,
      "translation.source_language": sourceLanguage,
      "translation.target_language": targetLanguage,
    },
    batchFn
  );
}
