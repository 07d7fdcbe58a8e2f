import { Layer } from "effect";
import { BoardActuatorGatewayLayer } from "./actuator-gateway/index.js";
import { SentryErrorReporterLayer } from "./error-reporter.js";
import { JsonLinesHistoryLogLayer } from "./history-log/json-lines.history-log.js";
import { PredictiveAdvisorLayer } from "./predictive-advisor/index.js";
import { SensorSamplerLayer } from "./sensor-sampler.js";
import { JsonFileSettingsStoreLayer } from "./settings-store/json-file.settings-store.js";
import { ClimateSettingsLayer } from "./settings/index.js";

const storageLayers = Layer.mergeAll(
  JsonLinesHistoryLogLayer,
  ClimateSettingsLayer.pipe(Layer.provide(JsonFileSettingsStoreLayer)),
);

export const serviceLayers = SensorSamplerLayer.pipe(
  Layer.provideMerge(Layer.mergeAll(BoardActuatorGatewayLayer, storageLayers)),
  Layer.merge(PredictiveAdvisorLayer),
  Layer.merge(SentryErrorReporterLayer),
);
