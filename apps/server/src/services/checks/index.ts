import type { ComplianceSection, SectionChecker } from "../../types/compliance.js";
import { checkBrand } from "./brandChecks.js";
import { checkLegal } from "./legalChecks.js";
import { checkOptIn } from "./optInChecks.js";
import { checkRegulatory } from "./regulatoryChecks.js";
import { checkTemplates } from "./templateChecks.js";
import { checkUrls } from "./urlChecks.js";

export const SECTION_CHECKERS: ReadonlyArray<{ section: ComplianceSection; check: SectionChecker }> = [
  { section: "brand", check: checkBrand },
  { section: "opt_in", check: checkOptIn },
  { section: "template", check: checkTemplates },
  { section: "url", check: checkUrls },
  { section: "legal", check: checkLegal },
  { section: "regulatory", check: checkRegulatory }
];

export { checkBrand, checkLegal, checkOptIn, checkRegulatory, checkTemplates, checkUrls };
