import { demoTemplate } from "../templates/demo.js";
import { singleRegionTemplate } from "../templates/single-region.js";

export const templates: Record<string, string> = {
  demo: demoTemplate,
  "single-region": singleRegionTemplate,
};

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(tmpl);
}
