/**
 * Distribution API Routes
 *
 * Runs, clears and reports section distributions. Every response body is
 * the service's structured result; the HTTP status mirrors its outcome.
 */

import { Router } from "express";
import { DistributionService } from "../../services/distributionService";
import { statusCodeFor } from "./routeHelpers";

export function createDistributionRouter(distributionService: DistributionService): Router {
  const router = Router();

  /**
   * GET /api/distribution
   * Distribution status of every course
   */
  router.get("/", (req, res) => {
    try {
      res.json(distributionService.statusAll());
    } catch (error) {
      console.error("Error fetching distribution status:", error);
      res.status(500).json({ error: "Failed to fetch distribution status" });
    }
  });

  /**
   * GET /api/distribution/courses/:courseId
   * Per-section rosters of one course
   */
  router.get("/courses/:courseId", (req, res) => {
    const result = distributionService.status(req.params.courseId);
    res.status(statusCodeFor(result)).json(result);
  });

  /**
   * POST /api/distribution/courses/:courseId
   * Distribute one course's registered students across its sections
   */
  router.post("/courses/:courseId", (req, res) => {
    const result = distributionService.distribute(req.params.courseId);
    res.status(statusCodeFor(result)).json(result);
  });

  /**
   * POST /api/distribution/language-groups/:groupId
   * Rotate a grade's students through a language group
   */
  router.post("/language-groups/:groupId", (req, res) => {
    const result = distributionService.distributeLanguageGroup(req.params.groupId);
    res.status(statusCodeFor(result)).json(result);
  });

  /**
   * POST /api/distribution/all
   * Clear and redistribute every language group and course
   */
  router.post("/all", (req, res) => {
    const result = distributionService.distributeAll();
    res.status(statusCodeFor(result)).json(result);
  });

  /**
   * DELETE /api/distribution/courses/:courseId
   * Empty the sections of one course (registrations are kept)
   */
  router.delete("/courses/:courseId", (req, res) => {
    const result = distributionService.clear(req.params.courseId);
    res.status(statusCodeFor(result)).json(result);
  });

  /**
   * DELETE /api/distribution
   * Empty every section
   */
  router.delete("/", (req, res) => {
    const result = distributionService.clearAll();
    res.status(statusCodeFor(result)).json(result);
  });

  return router;
}
