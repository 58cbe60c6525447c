export type LogSink = (message: string) => void;

/** Sink that writes `[component] message` to the console's warning stream. */
export function consoleSink(component: string): LogSink {
  return (message) => console.warn(`[${component}] ${message}`);
}
