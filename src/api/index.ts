import express from "express";
import cors from "cors";

import { SchedulerConfig, loadConfig } from "../config";
import { DistributionService } from "../services/distributionService";
import { SchoolDatabase, getSchoolDatabase } from "../stores/schoolDatabase";
import { createCoursesRouter } from "./routes/courses";
import { createDistributionRouter } from "./routes/distribution";
import { createGroupsRouter } from "./routes/groups";
import { createPeriodsRouter } from "./routes/periods";
import { createRoomsRouter } from "./routes/rooms";
import { createSectionsRouter } from "./routes/sections";
import { createUsersRouter } from "./routes/users";

export function createApp(db: SchoolDatabase, config: SchedulerConfig): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));
  app.use(express.json());

  const distributionService = new DistributionService(db, {
    seed: config.distributionSeed,
    courseTypePriority: config.courseTypePriority,
  });

  // Routes
  app.use("/api/courses", createCoursesRouter(db));
  app.use("/api/sections", createSectionsRouter(db));
  app.use("/api/periods", createPeriodsRouter(db));
  app.use("/api/rooms", createRoomsRouter(db));
  app.use("/api/users", createUsersRouter(db));
  app.use("/api/groups", createGroupsRouter(db));
  app.use("/api/distribution", createDistributionRouter(distributionService));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return app;
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const app = createApp(getSchoolDatabase(config.dataFile), config);
  app.listen(config.port, () => {
    console.log(`API server running on http://localhost:${config.port}`);
  });
}
