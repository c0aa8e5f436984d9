/**
 * Courses API Routes
 *
 * CRUD for courses plus the registration roster the distributor reads.
 */

import { Router } from "express";
import {
  CreateCourseInput,
  StudentCountRequirement,
  UpdateCourseInput,
  getTotalCapacity,
  isCourseDuration,
  isCourseType,
  isStudentCountRequirementType,
} from "../../domain/course";
import { CourseStore } from "../../stores/courseStore";
import { SchoolDatabase } from "../../stores/schoolDatabase";
import { SectionStore } from "../../stores/sectionStore";
import {
  optionalNumber,
  optionalString,
  optionalStringArray,
  sendStoreError,
} from "./routeHelpers";

function parseRequirement(value: unknown): StudentCountRequirement | undefined {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return undefined;
  }
  const type = value.type;
  if (!isStudentCountRequirementType(type)) {
    return undefined;
  }
  const count = "count" in value ? optionalNumber(value.count) : undefined;
  return { type, count };
}

// req.body is untyped JSON; pull out only the fields a course understands
function parseCourseBody(body: Record<string, unknown>): UpdateCourseInput {
  return {
    name: optionalString(body.name),
    code: optionalString(body.code),
    description: optionalString(body.description),
    gradeLevel: optionalNumber(body.gradeLevel),
    courseType: isCourseType(body.courseType) ? body.courseType : undefined,
    duration: isCourseDuration(body.duration) ? body.duration : undefined,
    numSections: optionalNumber(body.numSections),
    maxStudentsPerSection: optionalNumber(body.maxStudentsPerSection),
    exclusivityGroup: optionalString(body.exclusivityGroup),
    studentCountRequirement: parseRequirement(body.studentCountRequirement),
  };
}

export function createCoursesRouter(db: SchoolDatabase): Router {
  const router = Router();
  const courseStore = new CourseStore(db);
  const sectionStore = new SectionStore(db);

  /**
   * GET /api/courses
   * List courses, optionally filtered by ?gradeLevel=
   */
  router.get("/", (req, res) => {
    try {
      const gradeLevel = optionalNumber(req.query.gradeLevel);
      const courses =
        gradeLevel === undefined ? courseStore.getAll() : courseStore.getByGradeLevel(gradeLevel);
      res.json(courses);
    } catch (error) {
      console.error("Error fetching courses:", error);
      res.status(500).json({ error: "Failed to fetch courses" });
    }
  });

  /**
   * GET /api/courses/:id
   * Course with its sections and combined seat count
   */
  router.get("/:id", (req, res) => {
    try {
      const course = courseStore.load(req.params.id);
      if (!course) {
        return res.status(404).json({ error: "Course not found" });
      }
      res.json({
        ...course,
        totalCapacity: getTotalCapacity(course),
        sections: sectionStore.getByCourse(course.id),
      });
    } catch (error) {
      console.error("Error fetching course:", error);
      res.status(500).json({ error: "Failed to fetch course" });
    }
  });

  /**
   * POST /api/courses
   */
  router.post("/", (req, res) => {
    try {
      const fields = parseCourseBody(req.body ?? {});
      if (!fields.name || fields.name.trim().length === 0) {
        return res.status(400).json({ error: "Course name is required" });
      }
      if (fields.gradeLevel === undefined) {
        return res.status(400).json({ error: "gradeLevel is required" });
      }

      const input: CreateCourseInput = {
        ...fields,
        name: fields.name,
        gradeLevel: fields.gradeLevel,
        registeredStudentIds: optionalStringArray(req.body.registeredStudentIds),
      };
      res.status(201).json(courseStore.create(input));
    } catch (error) {
      sendStoreError(res, error, "create course");
    }
  });

  /**
   * PUT /api/courses/:id
   */
  router.put("/:id", (req, res) => {
    try {
      const updated = courseStore.update(req.params.id, parseCourseBody(req.body ?? {}));
      if (!updated) {
        return res.status(404).json({ error: "Course not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "update course");
    }
  });

  /**
   * DELETE /api/courses/:id
   * Also deletes the course's sections
   */
  router.delete("/:id", (req, res) => {
    try {
      if (!courseStore.delete(req.params.id)) {
        return res.status(404).json({ error: "Course not found" });
      }
      res.json({ success: true });
    } catch (error) {
      console.error("Error deleting course:", error);
      res.status(500).json({ error: "Failed to delete course" });
    }
  });

  // ============================================
  // Registration
  // ============================================

  /**
   * POST /api/courses/:id/students
   * Register students: { studentIds: string[] }
   */
  router.post("/:id/students", (req, res) => {
    try {
      const studentIds = optionalStringArray(req.body?.studentIds);
      if (!studentIds || studentIds.length === 0) {
        return res.status(400).json({ error: "studentIds array is required" });
      }

      const updated = courseStore.registerStudents(req.params.id, studentIds);
      if (!updated) {
        return res.status(404).json({ error: "Course not found" });
      }
      res.json(updated);
    } catch (error) {
      sendStoreError(res, error, "register students");
    }
  });

  /**
   * DELETE /api/courses/:id/students/:studentId
   */
  router.delete("/:id/students/:studentId", (req, res) => {
    try {
      const updated = courseStore.unregisterStudent(req.params.id, req.params.studentId);
      if (!updated) {
        return res.status(404).json({ error: "Course not found" });
      }
      res.json(updated);
    } catch (error) {
      console.error("Error unregistering student:", error);
      res.status(500).json({ error: "Failed to unregister student" });
    }
  });

  return router;
}
