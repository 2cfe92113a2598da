/**
 * @file synthlog public API
 *
 * Library surface for embedding the generator: load a configuration, build
 * an orchestrator over a sink and a clock, run it.
 *
 * @module
 */

export { config_load, config_parse, config_fromObject } from './config/loader.js';
export { SettingsService } from './config/settings.js';
export type { LogLevel, ResolvedSettings, SettingsOverrides, SettingsReport, SettingSource } from './config/settings.js';
export { SERVICE_TYPES, serviceType_is } from './config/types.js';
export type * from './config/types.js';

export { ConfigError, GenerationError, SinkError, SynthlogError, errorMessage_get } from './errors.js';

export { GENERATOR_FACTORIES, generator_create } from './generators/index.js';
export type { GenerationContext, LogRecord, RecordFields, ServiceGenerator, WireFormat } from './generators/index.js';

export { CorrelationFabric } from './identity/CorrelationFabric.js';
export type { CorrelationContext } from './identity/CorrelationFabric.js';
export { IdentityFabric } from './identity/IdentityFabric.js';
export type { Identity, IdentityPolicy } from './identity/IdentityFabric.js';
export { FakerRandomSource, randomSource_create, seed_derive } from './identity/RandomSource.js';
export type { RandomSource, WeightedChoice } from './identity/RandomSource.js';

export { OperationalLog, consoleTransport_create, fileTransport_create, operationalLog_silent } from './logging/OperationalLog.js';
export type { LogTransport } from './logging/OperationalLog.js';

export { ScenarioEngine } from './scenario/ScenarioEngine.js';
export type { AttackState, FailureState, ScenarioSnapshot } from './scenario/ScenarioEngine.js';

export { SimulatedClock, SystemClock } from './scheduler/Clock.js';
export type { Clock } from './scheduler/Clock.js';
export { GenerationOrchestrator } from './scheduler/GenerationOrchestrator.js';
export type { OrchestratorOptions, OrchestratorState, RunOptions, RunSummary, StopReason } from './scheduler/GenerationOrchestrator.js';
export { RateController } from './scheduler/RateController.js';
export type { ControllerCounters } from './scheduler/RateController.js';

export { FileSink } from './sink/FileSink.js';
export { MemorySink } from './sink/MemorySink.js';
export type { LogSink, SinkStats } from './sink/types.js';
