/**
 * Groups API Routes
 *
 * Language groups (trimester rotations) and course groups (mutually
 * exclusive registration).
 */

import { Router } from "express";
import { GroupStore } from "../../stores/groupStore";
import { SchoolDatabase } from "../../stores/schoolDatabase";
import {
  optionalNumber,
  optionalString,
  optionalStringArray,
  sendStoreError,
} from "./routeHelpers";

export function createGroupsRouter(db: SchoolDatabase): Router {
  const router = Router();
  const groupStore = new GroupStore(db);

  // ============================================
  // Language groups
  // ============================================

  router.get("/language", (req, res) => {
    try {
      res.json(groupStore.getLanguageGroups());
    } catch (error) {
      console.error("Error fetching language groups:", error);
      res.status(500).json({ error: "Failed to fetch language groups" });
    }
  });

  router.get("/language/:id", (req, res) => {
    try {
      const group = groupStore.loadLanguageGroup(req.params.id);
      if (!group) {
        return res.status(404).json({ error: "Language group not found" });
      }
      res.json(group);
    } catch (error) {
      console.error("Error fetching language group:", error);
      res.status(500).json({ error: "Failed to fetch language group" });
    }
  });

  /**
   * POST /api/groups/language
   * { gradeLevel, name?, periodIds?, courseIds? } where courseIds[i] runs in trimester i + 1
   */
  router.post("/language", (req, res) => {
    try {
      const gradeLevel = optionalNumber(req.body?.gradeLevel);
      if (gradeLevel === undefined) {
        return res.status(400).json({ error: "gradeLevel is required" });
      }

      const group = groupStore.createLanguageGroup({
        gradeLevel,
        name: optionalString(req.body.name),
        periodIds: optionalStringArray(req.body.periodIds),
        courseIds: optionalStringArray(req.body.courseIds),
      });
      res.status(201).json(group);
    } catch (error) {
      sendStoreError(res, error, "create language group");
    }
  });

  router.put("/language/:id", (req, res) => {
    try {
      const updated = groupStore.updateLanguageGroup(req.params.id, {
        name: optionalString(req.body?.name),
        periodIds: optionalStringArray(req.body?.periodIds),
        courseIds: optionalStringArray(req.body?.courseIds),
      });
      if (!updated) {
        return res.status(404).json({ error: "Language group not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update language group");
    }
  });

  router.delete("/language/:id", (req, res) => {
    try {
      if (!groupStore.deleteLanguageGroup(req.params.id)) {
        return res.status(404).json({ error: "Language group not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting language group:", error);
      res.status(500).json({ error: "Failed to delete language group" });
    }
  });

  // ============================================
  // Course groups
  // ============================================

  router.get("/course", (req, res) => {
    try {
      res.json(groupStore.getCourseGroups());
    } catch (error) {
      console.error("Error fetching course groups:", error);
      res.status(500).json({ error: "Failed to fetch course groups" });
    }
  });

  router.get("/course/:id", (req, res) => {
    try {
      const group = groupStore.loadCourseGroup(req.params.id);
      if (!group) {
        return res.status(404).json({ error: "Course group not found" });
      }
      res.json(group);
    } catch (error) {
      console.error("Error fetching course group:", error);
      res.status(500).json({ error: "Failed to fetch course group" });
    }
  });

  router.post("/course", (req, res) => {
    try {
      const name = optionalString(req.body?.name);
      if (!name) {
        return res.status(400).json({ error: "name is required" });
      }

      const group = groupStore.createCourseGroup({
        name,
        description: optionalString(req.body.description),
        courseIds: optionalStringArray(req.body.courseIds),
      });
      res.status(201).json(group);
    } catch (error) {
      sendStoreError(res, error, "create course group");
    }
  });

  router.put("/course/:id", (req, res) => {
    try {
      const updated = groupStore.updateCourseGroup(req.params.id, {
        name: optionalString(req.body?.name),
        description: optionalString(req.body?.description),
        courseIds: optionalStringArray(req.body?.courseIds),
      });
      if (!updated) {
        return res.status(404).json({ error: "Course group not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update course group");
    }
  });

  router.delete("/course/:id", (req, res) => {
    try {
      if (!groupStore.deleteCourseGroup(req.params.id)) {
        return res.status(404).json({ error: "Course group not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting course group:", error);
      res.status(500).json({ error: "Failed to delete course group" });
    }
  });

  return router;
}
