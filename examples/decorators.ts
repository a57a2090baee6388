import { createContainer, describeBean, named, globalContainer } from "../index";

// Interfaces have no runtime type, so a guard stands in for the check
interface Clock { now(): number }
const isClock = (v: unknown): boolean => typeof v === "object" && v !== null && "now" in v;

class Repository {
  id = Math.random().toString(16).slice(2);
}

class ReportService {
  private repo?: Repository;
  private clock?: Clock;
  private region = "default";

  describe() { return `repo=${this.repo?.id} at=${this.clock?.now()} region=${this.region}`; }
}

// Declared without decorators
describeBean(ReportService)
  .field("repo", "repository", { type: Repository })
  .field("clock", "clock", { guard: isClock })
  .field("region", "region,optional", { type: String });

const container = createContainer();
container.register(new Repository(), named("repository"));
container.register({ now: () => Date.now() }, named("clock"));
container.register(new ReportService(), named("reports"));

const reports = container.get("reports", ReportService);
console.log("ReportService:", reports.describe());

// The process-wide container works the same way
globalContainer.register("eu-west", named("region"));
console.log("global region:", globalContainer.find("region"));
