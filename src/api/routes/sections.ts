/**
 * Sections API Routes
 */

import { Router } from "express";
import { UpdateSectionInput, isTrimester } from "../../domain/section";
import { SchoolDatabase } from "../../stores/schoolDatabase";
import { SectionStore } from "../../stores/sectionStore";
import { nullableString, optionalNumber, optionalString, sendStoreError } from "./routeHelpers";

function parseSectionBody(body: Record<string, unknown>): UpdateSectionInput {
  const trimester = optionalNumber(body.trimester);
  return {
    name: optionalString(body.name),
    trimester: body.trimester === null ? null : isTrimester(trimester) ? trimester : undefined,
    maxStudents: optionalNumber(body.maxStudents),
    teacherId: nullableString(body.teacherId),
    periodId: nullableString(body.periodId),
    roomId: nullableString(body.roomId),
  };
}

export function createSectionsRouter(db: SchoolDatabase): Router {
  const router = Router();
  const sectionStore = new SectionStore(db);

  /**
   * GET /api/sections
   * Optional filters: ?courseId= or ?periodId=
   */
  router.get("/", (req, res) => {
    try {
      const courseId = optionalString(req.query.courseId);
      const periodId = optionalString(req.query.periodId);
      if (courseId) {
        return res.json(sectionStore.getByCourse(courseId));
      }
      if (periodId) {
        return res.json(sectionStore.getByPeriod(periodId));
      }
      res.json(sectionStore.getAll());
    } catch (error) {
      console.error("Error fetching sections:", error);
      res.status(500).json({ error: "Failed to fetch sections" });
    }
  });

  router.get("/:id", (req, res) => {
    try {
      const section = sectionStore.load(req.params.id);
      if (!section) {
        return res.status(404).json({ error: "Section not found" });
      }
      res.json({ ...section, capacity: sectionStore.getCapacity(section) });
    } catch (error) {
      console.error("Error fetching section:", error);
      res.status(500).json({ error: "Failed to fetch section" });
    }
  });

  /**
   * POST /api/sections
   * Section number and name default to the course's next section
   */
  router.post("/", (req, res) => {
    try {
      const courseId = optionalString(req.body?.courseId);
      if (!courseId) {
        return res.status(400).json({ error: "courseId is required" });
      }

      const section = sectionStore.create({
        ...parseSectionBody(req.body),
        courseId,
        sectionNumber: optionalNumber(req.body.sectionNumber),
      });
      res.status(201).json(section);
    } catch (error) {
      sendStoreError(res, error, "create section");
    }
  });

  router.put("/:id", (req, res) => {
    try {
      const updated = sectionStore.update(req.params.id, parseSectionBody(req.body ?? {}));
      if (!updated) {
        return res.status(404).json({ error: "Section not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update section");
    }
  });

  // ============================================
  // Manual enrollment adjustments
  // ============================================

  /**
   * POST /api/sections/:id/students
   * { studentId } - capacity is checked, period conflicts are not; the next
   * distribution replaces it
   */
  router.post("/:id/students", (req, res) => {
    try {
      const studentId = optionalString(req.body?.studentId);
      if (!studentId) {
        return res.status(400).json({ error: "studentId is required" });
      }
      const section = sectionStore.enrollStudent(req.params.id, studentId);
      if (!section) {
        return res.status(404).json({ error: "Section not found" });
      }
      res.json(section);
    } catch (error) {
      sendStoreError(res, error, "enroll student");
    }
  });

  router.delete("/:id/students/:studentId", (req, res) => {
    try {
      const section = sectionStore.removeStudent(req.params.id, req.params.studentId);
      if (!section) {
        return res.status(404).json({ error: "Section not found" });
      }
      res.json(section);
    } catch (error) {
      console.error("Error removing student from section:", error);
      res.status(500).json({ error: "Failed to remove student from section" });
    }
  });

  router.delete("/:id", (req, res) => {
    try {
      if (!sectionStore.delete(req.params.id)) {
        return res.status(404).json({ error: "Section not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting section:", error);
      res.status(500).json({ error: "Failed to delete section" });
    }
  });

  return router;
}
