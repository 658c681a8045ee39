/**
 * Generation prompt for the spec agent.
 *
 * The reply format is the contract the extractor parses: one JSON object
 * first, then code blocks fenced by BEGIN/END markers carrying the file name.
 */

export const SPEC_AGENT_SYSTEM_ROLE = "You are a professional digital design engineer.";

export function buildSpecPrompt(userSpec: string): string {
  return `
${SPEC_AGENT_SYSTEM_ROLE}

USER DESIGN REQUEST:
${userSpec.trim()}

You will produce output in this exact order:
1) A single JSON object that fully describes the design.
   - For a single module, the object itself is the module entry.
   - If the design contains multiple modules, return a top-level object:
       {
         "design_name": "top_module_name",
         "hierarchy": {
           "modules": [ <submodule entries> ],
           "top_module": <integration module entry>
         }
       }
   - Each module entry must contain:
       { "name", "description", "ports", "functionality", "rtl_output_file" }
2) Immediately after the JSON, output the Verilog-2005 implementation of every
   module, one block per file, delimited EXACTLY like this:

   ---BEGIN <rtl_output_file>---
   <full synthesizable Verilog-2005 code for that module>
   ---END <rtl_output_file>---

   For a single module you may instead use:

   ---BEGIN VERILOG---
   <full synthesizable Verilog-2005 code here>
   ---END VERILOG---

Do not omit these delimiters. Do not include any text or explanation outside the JSON and these blocks.
`.trim();
}
