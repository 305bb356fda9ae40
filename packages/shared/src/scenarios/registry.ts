import { beamTemplates } from "./templates/beams.js"
import { conceptTemplates } from "./templates/concepts.js"
import { curveTemplates } from "./templates/curves.js"
import { forceTemplates } from "./templates/forces.js"
import { momentTemplates } from "./templates/moments.js"
import { stressTemplates } from "./templates/stress.js"
import type { ScenarioTemplate } from "./types.js"

/**
 * Build the full template catalog. Call once at startup and hand the list
 * to the pool; ids are unique across the catalog.
 */
export function createTemplateRegistry(): readonly ScenarioTemplate[] {
  const templates = [
    ...beamTemplates(),
    ...forceTemplates(),
    ...stressTemplates(),
    ...momentTemplates(),
    ...curveTemplates(),
    ...conceptTemplates(),
  ]

  const seen = new Set<string>()
  for (const template of templates) {
    if (seen.has(template.id)) {
      throw new Error(`Duplicate template id: ${template.id}`)
    }
    seen.add(template.id)
  }
  return templates
}
