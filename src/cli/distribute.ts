import { loadConfig } from "../config";
import { DistributionService } from "../services/distributionService";
import { getSchoolDatabase } from "../stores/schoolDatabase";
import {
  formatBatchResult,
  formatCourseResult,
  formatLanguageGroupResult,
} from "./report";

const USAGE = `Usage: distribute <command>

Commands:
  all                        clear and redistribute every language group and course
  course <courseId>          distribute one course
  language-group <groupId>   rotate one language group
  clear [courseId]           empty one course's sections, or every section
  status <courseId>          show a course's current distribution`;

function print(lines: string[]): void {
  console.log(lines.join("\n"));
}

/**
 * Run one command and return the process exit code
 */
export function runDistributeCommand(args: string[], service: DistributionService): number {
  const [command, id] = args;

  switch (command) {
    case "all": {
      const result = service.distributeAll();
      if (!result.success) {
        console.error(`❌ ${result.error}`);
        return 1;
      }
      print(formatBatchResult(result));
      return 0;
    }

    case "course":
    case "status": {
      if (!id) {
        console.error(USAGE);
        return 2;
      }
      const result = command === "course" ? service.distribute(id) : service.status(id);
      if (!result.success) {
        console.error(`❌ ${result.error}`);
        return 1;
      }
      print(formatCourseResult(result));
      return 0;
    }

    case "language-group": {
      if (!id) {
        console.error(USAGE);
        return 2;
      }
      const result = service.distributeLanguageGroup(id);
      if (!result.success) {
        console.error(`❌ ${result.error}`);
        return 1;
      }
      print(formatLanguageGroupResult(result));
      return 0;
    }

    case "clear": {
      const result = id ? service.clear(id) : service.clearAll();
      if (!result.success) {
        console.error(`❌ ${result.error ?? "Failed to clear distribution"}`);
        return 1;
      }
      console.log(`🧹 Cleared ${result.sectionsCleared} section(s)`);
      return 0;
    }

    default:
      console.error(USAGE);
      return 2;
  }
}

if (require.main === module) {
  const config = loadConfig();
  const service = new DistributionService(getSchoolDatabase(config.dataFile), {
    seed: config.distributionSeed,
    courseTypePriority: config.courseTypePriority,
  });
  process.exitCode = runDistributeCommand(process.argv.slice(2), service);
}
