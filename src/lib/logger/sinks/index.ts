// Built-in sinks
export { ArraySink } from './array';
export { ConsoleSink, type ConsoleSinkOptions } from './console';
