/**
 * Pipeline HTTP routes: run the weather pipeline and return its result as JSON
 */
import type { Express, Request, Response } from "express";
import { z } from "zod";
import {
  type PipelineDeps,
  runWeatherPipeline,
} from "../pipeline/weather-pipeline.js";
import {
  InvalidInputError,
  sanitizeCity,
} from "../services/weather.service.js";

const runPipelineBody = z.object({
  city: z.string().optional(),
});

function createRunHandler(deps: PipelineDeps, defaultCity: string) {
  return async (req: Request, res: Response) => {
    const parsed = runPipelineBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid request body",
        details: parsed.error.issues.map((i) => i.message),
      });
      return;
    }

    try {
      const result = await runWeatherPipeline(
        sanitizeCity(parsed.data.city ?? defaultCity),
        deps
      );
      res.status(200).json(result);
    } catch (err) {
      if (err instanceof InvalidInputError) {
        res.status(400).json({ error: err.message });
        return;
      }
      console.error("Error running weather pipeline:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  };
}

/**
 * Setup pipeline routes on Express app
 */
export function setupPipelineRoutes(
  app: Express,
  deps: PipelineDeps,
  defaultCity: string
) {
  app.post("/pipeline/run", createRunHandler(deps, defaultCity));
}
