/**
 * Periods API Routes
 */

import { Router } from "express";
import { PeriodStore } from "../../stores/periodStore";
import { SchoolDatabase } from "../../stores/schoolDatabase";
import { SectionStore } from "../../stores/sectionStore";
import { optionalString, sendStoreError } from "./routeHelpers";

export function createPeriodsRouter(db: SchoolDatabase): Router {
  const router = Router();
  const periodStore = new PeriodStore(db);
  const sectionStore = new SectionStore(db);

  /**
   * GET /api/periods
   * All periods in start-time order
   */
  router.get("/", (req, res) => {
    try {
      res.json(periodStore.getAll());
    } catch (error) {
      console.error("Error fetching periods:", error);
      res.status(500).json({ error: "Failed to fetch periods" });
    }
  });

  /**
   * GET /api/periods/:id
   * Period with the sections meeting in it
   */
  router.get("/:id", (req, res) => {
    try {
      const period = periodStore.load(req.params.id);
      if (!period) {
        return res.status(404).json({ error: "Period not found" });
      }
      res.json({ ...period, sections: sectionStore.getByPeriod(period.id) });
    } catch (error) {
      console.error("Error fetching period:", error);
      res.status(500).json({ error: "Failed to fetch period" });
    }
  });

  router.post("/", (req, res) => {
    try {
      const name = optionalString(req.body?.name);
      const startTime = optionalString(req.body?.startTime);
      const endTime = optionalString(req.body?.endTime);
      if (!name || !startTime || !endTime) {
        return res.status(400).json({ error: "name, startTime and endTime are required" });
      }

      res.status(201).json(periodStore.create({ name, startTime, endTime }));
    } catch (error) {
      sendStoreError(res, error, "create period");
    }
  });

  router.put("/:id", (req, res) => {
    try {
      const updated = periodStore.update(req.params.id, {
        name: optionalString(req.body?.name),
        startTime: optionalString(req.body?.startTime),
        endTime: optionalString(req.body?.endTime),
      });
      if (!updated) {
        return res.status(404).json({ error: "Period not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update period");
    }
  });

  /**
   * DELETE /api/periods/:id
   * Sections meeting in the period become unscheduled
   */
  router.delete("/:id", (req, res) => {
    try {
      if (!periodStore.delete(req.params.id)) {
        return res.status(404).json({ error: "Period not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting period:", error);
      res.status(500).json({ error: "Failed to delete period" });
    }
  });

  return router;
}
