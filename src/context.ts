import { Settings } from "./config";
import { HttpClient } from "./http/client";
import { Logger } from "./logger";
import { Palette } from "./palette";
import { AnalysisService } from "./services/analysisService";
import { WeeklyService } from "./services/weeklyService";
import { secondsToMs } from "./util/time";
import { WeeklyReportGenerator } from "./weekly/generator";
import { AnthropicNarrativeModel } from "./weekly/narrative";
import { TAPD_HEADERS, TapdClient } from "./weekly/tapdClient";

export const VERSION = "1.0.0";

export type Runtime = {
  settings: Settings;
  logger: Logger;
  analysis: AnalysisService;
  weekly: WeeklyService;
};

function requestOptions(settings: Settings) {
  return {
    timeoutMs: secondsToMs(settings.request.timeoutSeconds),
    retryTimes: settings.request.retryTimes,
    retryDelayMs: secondsToMs(settings.request.retryDelaySeconds),
  };
}

/** Wires clients and services from settings. Nothing touches the network here. */
export function createRuntime(settings: Settings, logger: Logger, palette: Palette): Runtime {
  const mericoHttp = new HttpClient({
    ...requestOptions(settings),
    auth: { kind: "bearer", token: settings.merico.token },
    logger: logger.child("http"),
  });

  const tapdHttp = new HttpClient({
    ...requestOptions(settings),
    headers: TAPD_HEADERS,
    auth: { kind: "cookies", cookies: settings.tapd.cookies },
    logger: logger.child("tapd.http"),
  });

  const generator = new WeeklyReportGenerator(
    new TapdClient(tapdHttp, { baseUrl: settings.tapd.baseUrl, logger: logger.child("tapd") }),
    new AnthropicNarrativeModel({ apiKey: settings.llm.apiKey, model: settings.llm.model, logger: logger.child("llm") }),
    { logger: logger.child("weekly") }
  );

  return {
    settings,
    logger,
    analysis: new AnalysisService(settings, { http: mericoHttp, logger: logger.child("analysis"), palette }),
    weekly: new WeeklyService(generator, settings.output.outputDir, { logger: logger.child("weekly") }),
  };
}
