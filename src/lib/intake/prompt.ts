/**
 * Fixed instruction prompt sent to the image-understanding collaborator
 */

import { DATA_TYPES } from "../../types/schema.js";

const BASE_PROMPT = `Analyze this Entity Relationship Diagram (ERD) image and extract its schema as JSON.

1. Entities: for each entity give its name (PascalCase), every attribute with its data type,
   primary keys, foreign keys and what they reference, and constraints (nullable, unique,
   max_length, default values).
2. Relationships: for each relationship give the source entity, the target entity, the
   relationship type (1:1, 1:N, N:1, M:N) and any cardinality annotations.
3. The project name, if one is visible.

Return a single JSON object with this structure:
{
  "project_name": "string or null",
  "entities": [
    {
      "name": "EntityName",
      "table_name": "table_name or null",
      "attributes": [
        {
          "name": "attribute_name",
          "data_type": "${DATA_TYPES.join("|")}",
          "is_primary_key": true,
          "is_foreign_key": false,
          "is_nullable": true,
          "is_unique": false,
          "max_length": null,
          "default_value": null,
          "references_table": "EntityName or null",
          "references_column": "attribute_name or null"
        }
      ]
    }
  ],
  "relationships": [
    {
      "name": "relationship_name or null",
      "source_entity": "SourceEntity",
      "target_entity": "TargetEntity",
      "relationship_type": "1:1|1:N|N:1|M:N",
      "source_cardinality": "string or null",
      "target_cardinality": "string or null"
    }
  ],
  "metadata": {
    "confidence_score": 0.0,
    "notes": "any additional observations"
  }
}

Guidelines:
- Use snake_case for attribute names and PascalCase for entity names.
- Infer data types from attribute names and context; default to "string" when unsure.
- references_table must name an entity from the entities list.
- Return valid JSON only.`;

/**
 * Build the analysis prompt, appending the caller's free-text hint when present
 */
export function buildAnalysisPrompt(hint?: string): string {
  const trimmed = hint?.trim();
  if (!trimmed) {
    return BASE_PROMPT;
  }
  return `${BASE_PROMPT}\n\nAdditional context: ${trimmed}`;
}
