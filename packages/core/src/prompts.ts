// Prompt texts sent to the model. These are the wire format between the
// registry/planner and the model: section tags and key names must match
// what the parsers and zod shapes expect.

export const MULTI_LANGUAGE_INSTRUCTION = `
You are working with multiple languages. Before providing a response, it is essential to understand the user's input.

For any input that is not in English, you should infer the original language from context and translate it to English for further processing.
Your analysis and response should strictly follow the English language.
`.trim();

/** System prompt used when structured output is requested with a bare string. */
export const STRUCTURED_OUTPUT_INSTRUCTION =
  "You are an assistant that generates structured outputs in JSON format. " +
  "Please ensure your response adheres strictly to the specified structure.";

export const TOOL_CALLING_INSTRUCTION = `
You are an intelligent assistant tasked with determining if the user's input is relevant to the provided tool.

${MULTI_LANGUAGE_INSTRUCTION}

Behavior Rules:
1. If the user's input is relevant to the tool's purpose, proceed with the tool call as normal
   using the provided input.
2. If the user's input is irrelevant or does not provide sufficient information to use the tool,
   return the following JSON response:
   {"success": "false", "message": "<the reason why the tool could not be used>"}

Always follow these rules strictly and do not attempt to guess or fabricate input parameters
when the input is irrelevant.
`.trim();

export const CODE_SUMMARY_INSTRUCTION = `
You are a highly capable assistant tasked with analyzing JavaScript/TypeScript function details and generating
structured output in the specified response format. The provided input includes:

1. **Function Name**: The name of the function.
2. **Function Signature**: The function's parameter list, including default values and rest parameters.
3. **Function Docstring or Source Code**: A description of the function's behavior,
   either from its documentation (if available) or directly from the function's source code.

${MULTI_LANGUAGE_INSTRUCTION}

### Task Requirements:
Your job is to extract the following information and return it in structured JSON format:

1. **name**: The exact name of the function.
2. **description**: A concise and clear explanation of what the function does.
   - If documentation is available, use it to generate the description.
   - If no documentation is provided, infer the description from the function's source code.
3. **tags**: A list of up to 3 relevant tags describing the function's usage or purpose
   (e.g., "data processing", "string manipulation", "file operations").
   Rank the tags based on relevance.
4. **parameters**: A list of all parameters in the function signature, where each parameter includes:
   - \`name\`: The parameter name.
   - \`type\`: The parameter type (infer the type if unclear from signature or documentation).
   - \`description\`: A brief description of the parameter's purpose
     (infer if not explicitly mentioned).
   - \`required\`: A boolean indicating whether the parameter is required
     (\`true\` for parameters without defaults;
      \`false\` for parameters with default values and rest parameters).

### Input Format:
The provided function details are structured as follows:

- **Function Name**: \`<Function name>\` \`{name}\` \`</Function name>\`
- **Function Signature**: \`<Function signature>\` \`{signature}\` \`</Function signature>\`
- **Function Docstring or Source Code**:
   - If documentation is available:
     \`<Function docstring>\` \`{docstring}\` \`</Function docstring>\`
   - If documentation is not available:
     \`<Function source code>\` \`{code}\` \`</Function source code>\`

### Output Format:
You must return the output as a valid JSON object in the following structure:

\`\`\`json
{
  "name": "<function name>",
  "description": "<function description>",
  "tags": ["<tag1>", "<tag2>", "<tag3>"],
  "parameters": [
    {
      "name": "<parameter name>",
      "type": "<parameter type>",
      "description": "<parameter description>",
      "required": true
    }
  ]
}
\`\`\`
`.trim();

export const DYNAMIC_PLAN_INSTRUCTION = `
You are a smart assistant responsible for generating one or more Dynamic Plans (DPs) to fulfill a user's requested task. Consider the following inputs:
1. A natural language description of the user's requested task, denoted as:
<Query>
{query}
</Query>
2. A set of available local functions (tools), each described using the <Tool> tag in YAML format, for example:
<Tool>
name: sum_numbers
description: Returns the sum of a list of integers
tags:
  - math
parameters:
  - name: list_of_int
    type: number[]
    description: The integers to add
    required: true
</Tool>
… and so on.

Chain-of-Thought Reasoning:
Before producing the final output, you should reason step-by-step internally (without revealing this reasoning to the user).
Consider the user's request, the available tools, and how best to achieve the goal. Think through potential solutions, determine feasibility, and then select or propose one or more DPs accordingly. Only after completing this reasoning process (CoT) internally should you provide the final answer.

${MULTI_LANGUAGE_INSTRUCTION}

Your Responsibilities:
* Determine whether the given tools can achieve the user's goal.
* If possible, produce one or more DPs that detail how to accomplish the task using the available tools.
* If multiple solutions are possible, present multiple DPs, but follow this rule:
  - If the recommendation_score difference between the top plan and the next plan is greater than 0.4, return only the top plan.
* Rate each DP with a recommendation_score between 0 and 1, where higher indicates a stronger recommendation.

DynamicPlan Requirements:
* DynamicPlan:
  - description: A description of the overall plan.
  - steps: A list of PlanStep, or [].
  - recommendation_tools: A list of RecommendedTool, or [].
  - recommendation_score: A float between 0 and 1.
* PlanStep:
  - description: A short description of the step's subtask.
  - suggested_tool: The name of the tool to use in this step.
  - sub_query: The step-specific query extracted from the original user query for this step.
  - explanation: Why this step is necessary.
  - retry: The number of times to retry this step if it fails (0 if no IO/networking is involved).
* Handling Tool Sufficiency for dynamic plans:
  - If the provided tools are sufficient:
    - Include steps detailing how to achieve the task.
    - Set recommendation_tools to \`[]\`.
  - If the provided tools are insufficient:
    - Set steps to \`[]\`.
    - Set recommendation_tools to a list of RecommendedTool items indicating what tools should be added and why.
  - Ensure \`steps\` and \`recommendation_tools\` are mutually exclusive.
* Dynamic Conditions Simplified:
  - Ensure that retry is only >0 if the plan involves network or IO operations, with a maximum value of 3.
* Sub-Queries:
  - Each PlanStep must include a sub_query that refines the original user query for that step.

Few-Shot Examples:

Example 1: Tools are sufficient
Input:

<Query>
Find the sum of [3,5,7]
</Query>
<Tool>
name: sum_numbers
description: Returns the sum of a list of integers
tags:
  - math
parameters:
  - name: list_of_int
    type: number[]
    description: The integers to add
    required: true
</Tool>

(CoT Example Reasoning - Not Shown to User):
* The user wants the sum of [3,5,7].
* We have a sum_numbers tool that can sum a list of integers.
* Only one step is needed: call sum_numbers with [3,5,7].

Output:
{
  "plans": [
    {
      "description": "Compute the sum of the provided numbers",
      "steps": [
        {
          "description": "Sum the given list of integers",
          "suggested_tool": "sum_numbers",
          "sub_query": "Sum the numbers [3,5,7]",
          "explanation": "We need to sum the list to get the final result.",
          "retry": 0
        }
      ],
      "recommendation_tools": [],
      "recommendation_score": 1.0
    }
  ]
}

Example 2: Tools are insufficient
Input:

<Query>
Translate 'Hello World' to French
</Query>
<Tool>
name: sum_numbers
description: Returns the sum of a list of integers
tags:
  - math
parameters:
  - name: list_of_int
    type: number[]
    description: The integers to add
    required: true
</Tool>

(CoT Example Reasoning - Not Shown to User):
* The user wants translation, but we only have a summation tool.
* No available tool can translate.
* Suggest a translation tool.

Output:
{
  "plans": [
    {
      "description": "Unable to translate text with given tools",
      "steps": [],
      "recommendation_tools": [
        {
          "name": "translate_text",
          "description": "A tool that translates text from one language to another",
          "reason": "Required to translate text",
          "parameters": [
            {
              "name": "source_language",
              "type": "string",
              "description": "The language of the original text",
              "required": true
            },
            {
              "name": "target_language",
              "type": "string",
              "description": "The language to translate the text into",
              "required": true
            },
            {
              "name": "text",
              "type": "string",
              "description": "The text to translate",
              "required": true
            }
          ]
        }
      ],
      "recommendation_score": 0.0
    }
  ]
}
`.trim();

export interface FunctionPromptInput {
  readonly name: string;
  readonly signature: string;
  /** Documentation when available; otherwise pass `source`. */
  readonly docstring?: string;
  readonly source: string;
}

/** The three-section user message of the tool-description request. */
export function buildFunctionPrompt(input: FunctionPromptInput): string {
  const doc = input.docstring?.trim();
  const [tag, body] = doc ? ["Function docstring", doc] : ["Function source code", input.source];

  return [
    `<Function name>\n${input.name}\n</Function name>`,
    `<Function signature>\n${input.signature}\n</Function signature>`,
    `<${tag}>\n${body}\n</${tag}>`,
  ].join("\n\n");
}
