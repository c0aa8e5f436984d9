/**
 * Users API Routes
 *
 * Students, teachers and administrators share one collection and differ
 * by role.
 */

import { Router } from "express";
import { isUserRole } from "../../domain/user";
import { ConflictChecker } from "../../services/conflictChecker";
import { CourseStore } from "../../stores/courseStore";
import { SchoolDatabase } from "../../stores/schoolDatabase";
import { SectionStore } from "../../stores/sectionStore";
import { UserStore } from "../../stores/userStore";
import { optionalNumber, optionalString, sendStoreError } from "./routeHelpers";

export function createUsersRouter(db: SchoolDatabase): Router {
  const router = Router();
  const userStore = new UserStore(db);
  const courseStore = new CourseStore(db);
  const sectionStore = new SectionStore(db);
  const conflictChecker = new ConflictChecker(db);

  /**
   * GET /api/users
   * Optional filters: ?role= and, for students, ?gradeLevel=
   */
  router.get("/", (req, res) => {
    try {
      const role = isUserRole(req.query.role) ? req.query.role : undefined;
      const gradeLevel = optionalNumber(req.query.gradeLevel);
      if (gradeLevel !== undefined) {
        return res.json(userStore.getStudents(gradeLevel));
      }
      res.json(userStore.getAll(role));
    } catch (error) {
      console.error("Error fetching users:", error);
      res.status(500).json({ error: "Failed to fetch users" });
    }
  });

  /**
   * GET /api/users/teachers/available?periodId=
   */
  router.get("/teachers/available", (req, res) => {
    try {
      const periodId = optionalString(req.query.periodId);
      if (!periodId) {
        return res.status(400).json({ error: "periodId is required" });
      }
      res.json(userStore.getAvailableTeachers(periodId));
    } catch (error) {
      console.error("Error fetching available teachers:", error);
      res.status(500).json({ error: "Failed to fetch available teachers" });
    }
  });

  /**
   * GET /api/users/:id/schedule
   * A student's registered courses, the sections they were placed in, and
   * the courses they attend in each period
   */
  router.get("/:id/schedule", (req, res) => {
    try {
      const user = userStore.load(req.params.id);
      if (!user) {
        return res.status(404).json({ error: "User not found" });
      }
      res.json({
        user,
        registeredCourses: courseStore.findByStudent(user.id),
        sections: sectionStore.getByStudent(user.id),
        periods: Object.fromEntries(conflictChecker.getStudentPeriodAssignments(user.id)),
      });
    } catch (error) {
      console.error("Error fetching schedule:", error);
      res.status(500).json({ error: "Failed to fetch schedule" });
    }
  });

  router.get("/:id", (req, res) => {
    try {
      const user = userStore.load(req.params.id);
      if (!user) {
        return res.status(404).json({ error: "User not found" });
      }
      res.json(user);
    } catch (error) {
      console.error("Error fetching user:", error);
      res.status(500).json({ error: "Failed to fetch user" });
    }
  });

  router.post("/", (req, res) => {
    try {
      const firstName = optionalString(req.body?.firstName);
      const lastName = optionalString(req.body?.lastName);
      if (!firstName || !lastName) {
        return res.status(400).json({ error: "firstName and lastName are required" });
      }

      const user = userStore.create({
        firstName,
        lastName,
        role: isUserRole(req.body.role) ? req.body.role : undefined,
        email: optionalString(req.body.email),
        gradeLevel: optionalNumber(req.body.gradeLevel),
      });
      res.status(201).json(user);
    } catch (error) {
      sendStoreError(res, error, "create user");
    }
  });

  router.put("/:id", (req, res) => {
    try {
      const updated = userStore.update(req.params.id, {
        firstName: optionalString(req.body?.firstName),
        lastName: optionalString(req.body?.lastName),
        email: optionalString(req.body?.email),
        gradeLevel: optionalNumber(req.body?.gradeLevel),
      });
      if (!updated) {
        return res.status(404).json({ error: "User not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update user");
    }
  });

  /**
   * DELETE /api/users/:id
   * Removes the user from every roster and section
   */
  router.delete("/:id", (req, res) => {
    try {
      if (!userStore.delete(req.params.id)) {
        return res.status(404).json({ error: "User not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting user:", error);
      res.status(500).json({ error: "Failed to delete user" });
    }
  });

  return router;
}
