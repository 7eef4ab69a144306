export { DcaEngine, systemClock, type Clock, type DcaEngineOptions } from "./dca-engine.js";
export { DcaError, isDcaError, isRetryable, type DcaErrorCode } from "./errors.js";
export { OrderEventBus, type OrderEvent, type OrderEventOf, type OrderEventType } from "./events.js";
export { OrderStore } from "./order-store.js";
export { OrderFactory, deriveSchedule, orderIdFor, normalizeOwner, isFrequencyClass } from "./order-factory.js";
export { DueOrderScanner, isDue, nextEligibleTime } from "./due-scanner.js";
export { ExecutionEngine, checkPriceWindow, isCompleted } from "./execution-engine.js";
export { LifecycleTerminator } from "./lifecycle-terminator.js";
