import { describe, test, expect } from "vitest";
import { PlanGenerator, buildPlanPrompt, NO_AGENTS_DESCRIPTION, type PlanGeneratorOptions } from "../plan-generator";
import { LlmGateway } from "../llm-gateway";
import { DYNAMIC_PLAN_INSTRUCTION } from "../prompts";
import { generateId } from "../id";
import {
  PlanGenerationError,
  RefusalError,
  type DynamicPlan,
  type RegisteredTool,
  type ToolSchema,
} from "../types";
import { MockTransport, completion, jsonCompletion } from "../__fixtures__/mock-transport";

const addSchema: ToolSchema = {
  name: "add",
  description: "Adds two numbers",
  tags: ["math"],
  parameters: [{ name: "a", type: "number", description: "First operand", required: true }],
};

function toolsOf(...schemas: ToolSchema[]): ReadonlyMap<string, RegisteredTool> {
  const tools = new Map<string, RegisteredTool>();
  for (const schema of schemas) {
    const codeId = generateId(schema.name);
    tools.set(codeId, {
      invoke: async () => undefined,
      source: () => undefined,
      entryPoint: `/agent/v1/test/${schema.name}`,
      codeId,
      variant: { kind: "inline" },
      schema,
    });
  }
  return tools;
}

function createGenerator(transport: MockTransport, options: Partial<PlanGeneratorOptions> = {}) {
  const gateway = new LlmGateway({ transport, sleep: async () => undefined });
  return new PlanGenerator({ gateway, ...options });
}

const sumStep = {
  description: "Sum the given list of integers",
  suggested_tool: "add",
  sub_query: "Sum 3 and 5",
  explanation: "We need the sum.",
  retry: 0,
};

const translator = {
  name: "translate_text",
  description: "Translates text",
  reason: "Required to translate text",
  parameters: [{ name: "text", type: "string", description: "The text", required: true }],
};

describe("buildPlanPrompt", () => {
  test("query block followed by one tool block per schema", () => {
    const second: ToolSchema = { name: "noop", description: "Does nothing", tags: [], parameters: [] };

    expect(buildPlanPrompt("Sum 3 and 5", [addSchema, second])).toBe(
      [
        "<Query>",
        "Sum 3 and 5",
        "</Query>",
        "<Tool>",
        "name: add",
        "description: Adds two numbers",
        "tags:",
        "  - math",
        "parameters:",
        "  - name: a",
        "    type: number",
        "    description: First operand",
        "    required: true",
        "</Tool>",
        "<Tool>",
        "name: noop",
        "description: Does nothing",
        "tags: []",
        "parameters: []",
        "</Tool>",
      ].join("\n"),
    );
  });
});

describe("PlanGenerator", () => {
  test("empty tool map yields the single no-agents plan without a remote call", async () => {
    const transport = new MockTransport();
    const generator = createGenerator(transport);

    const plans = await generator.generatePlan("anything", new Map());

    expect(plans).toEqual([
      {
        id: generateId(NO_AGENTS_DESCRIPTION),
        description: "No agents available",
        steps: [],
        recommendationTools: [],
        recommendationScore: 0,
        nExecution: 0,
      },
    ]);
    expect(transport.callHistory).toHaveLength(0);
  });

  test("sends the planning prompt in a single attempt", async () => {
    const transport = new MockTransport([jsonCompletion({ plans: [] })]);
    const generator = createGenerator(transport);

    await generator.generatePlan("Sum 3 and 5", toolsOf(addSchema));

    const request = transport.lastCall();
    expect(request?.model).toBe("openai/gpt-4o-2024-11-20");
    expect(request?.maxTokens).toBe(1000);
    expect(request?.responseFormat?.name).toBe("DynamicPlanContainer");
    expect(request?.messages).toEqual([
      { role: "system", content: DYNAMIC_PLAN_INSTRUCTION },
      { role: "user", content: buildPlanPrompt("Sum 3 and 5", [addSchema]) },
    ]);
  });

  test("maps plans to tracers in emission order", async () => {
    const transport = new MockTransport([
      jsonCompletion({
        plans: [
          { description: "Add directly", steps: [sumStep], recommendation_tools: [], recommendation_score: 0.9 },
          { description: "Ask for a translator", steps: [], recommendation_tools: [translator], recommendation_score: 0.2 },
        ],
      }),
    ]);
    const generator = createGenerator(transport);

    const plans = await generator.generatePlan("Sum 3 and 5", toolsOf(addSchema));

    expect(plans.map((p) => p.description)).toEqual(["Add directly", "Ask for a translator"]);
    expect(plans[0]).toEqual({
      id: generateId("Add directly"),
      description: "Add directly",
      steps: [
        {
          description: "Sum the given list of integers",
          suggestedTool: "add",
          subQuery: "Sum 3 and 5",
          explanation: "We need the sum.",
          retry: 0,
        },
      ],
      recommendationTools: [],
      recommendationScore: 0.9,
      nExecution: 0,
    });
    expect(plans[1].recommendationTools[0].reason).toBe("Required to translate text");
    expect(plans[1].parentId).toBeUndefined();
  });

  test("missing step and recommendation lists default to empty", async () => {
    const transport = new MockTransport([
      jsonCompletion({ plans: [{ description: "Nothing to do", recommendation_score: 0.1 }] }),
    ]);

    const [plan] = await createGenerator(transport).generatePlan("q", toolsOf(addSchema));

    expect(plan.steps).toEqual([]);
    expect(plan.recommendationTools).toEqual([]);
  });

  test("refusals propagate unchanged", async () => {
    const transport = new MockTransport([completion(null, { refusal: "Not allowed" })]);

    await expect(createGenerator(transport).generatePlan("q", toolsOf(addSchema))).rejects.toBeInstanceOf(RefusalError);
  });

  test("other failures are wrapped, without retry", async () => {
    const cause = new Error("Status 502");
    const transport = new MockTransport([cause]);

    const failure = createGenerator(transport).generatePlan("q", toolsOf(addSchema));

    await expect(failure).rejects.toBeInstanceOf(PlanGenerationError);
    await expect(failure).rejects.toMatchObject({ message: "Plan generation failed: Status 502", cause });
    expect(transport.callHistory).toHaveLength(1);
  });

  describe("exclusivity", () => {
    const mixed = {
      description: "Both",
      steps: [{ ...sumStep, retry: 5 }],
      recommendation_tools: [translator],
      recommendation_score: 0.7,
    };

    test("normalize keeps steps, drops recommendations and clamps retry", async () => {
      const transport = new MockTransport([jsonCompletion({ plans: [mixed] })]);

      const [plan] = await createGenerator(transport).generatePlan("q", toolsOf(addSchema));

      expect(plan.recommendationTools).toEqual([]);
      expect(plan.steps).toHaveLength(1);
      expect(plan.steps[0].retry).toBe(3);
    });

    test("reject throws PlanGenerationError", async () => {
      const transport = new MockTransport([jsonCompletion({ plans: [mixed] })]);

      await expect(
        createGenerator(transport, { exclusivity: "reject" }).generatePlan("q", toolsOf(addSchema)),
      ).rejects.toThrow('Plan "Both" has both steps and recommended tools');
    });

    test("off leaves plans untouched", async () => {
      const transport = new MockTransport([jsonCompletion({ plans: [mixed] })]);

      const [plan] = await createGenerator(transport, { exclusivity: "off" }).generatePlan("q", toolsOf(addSchema));

      expect(plan.recommendationTools).toHaveLength(1);
      expect(plan.steps[0].retry).toBe(5);
    });
  });

  describe("score gap", () => {
    function planScored(description: string, score: number) {
      return { description, steps: [sumStep], recommendation_tools: [], recommendation_score: score };
    }

    test("off by default", async () => {
      const transport = new MockTransport([
        jsonCompletion({ plans: [planScored("A", 0.9), planScored("B", 0.3)] }),
      ]);

      const plans = await createGenerator(transport).generatePlan("q", toolsOf(addSchema));
      expect(plans).toHaveLength(2);
    });

    test("keeps only the leader when it is far enough ahead", async () => {
      const transport = new MockTransport([
        jsonCompletion({ plans: [planScored("B", 0.3), planScored("A", 0.9)] }),
      ]);

      const plans = await createGenerator(transport, { scoreGap: 0.4 }).generatePlan("q", toolsOf(addSchema));
      expect(plans.map((p) => p.description)).toEqual(["A"]);
    });

    test("keeps every plan when scores are close", async () => {
      const transport = new MockTransport([
        jsonCompletion({ plans: [planScored("A", 0.9), planScored("B", 0.6)] }),
      ]);

      const plans = await createGenerator(transport, { scoreGap: 0.4 }).generatePlan("q", toolsOf(addSchema));
      expect(plans.map((p) => p.description)).toEqual(["A", "B"]);
    });
  });

  test("markExecuted and derivePlan track replays and lineage", () => {
    const generator = createGenerator(new MockTransport());
    const base: DynamicPlan = { description: "Parent", steps: [], recommendationTools: [], recommendationScore: 1 };
    const parent = { ...base, id: generateId("Parent"), nExecution: 0 };

    generator.markExecuted(parent);
    generator.markExecuted(parent);
    expect(parent.nExecution).toBe(2);

    const child = generator.derivePlan(parent, { ...base, description: "Child" });
    expect(child.parentId).toBe(parent.id);
    expect(child.id).toBe(generateId("Child"));
    expect(child.nExecution).toBe(0);
  });
});
