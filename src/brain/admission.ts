import type { PlanningInput } from "./interface.js";
import type { Action } from "../types.js";
import { completeParameters } from "../description/parameterCompleter.js";
import { defaultMessage } from "./llm/responseParser.js";
import { metrics, METRIC_ACTIONS_SKIPPED } from "../metrics.js";
import { toJson } from "../http.js";

/**
 * Keep only actions that resolve to an enabled function, under the
 * function's canonical name, with missing params completed from the
 * description and a message attached. Repeated identical actions collapse.
 */
export function admitActions(actions: Action[], input: PlanningInput): Action[] {
    const admitted: Action[] = [];
    const seen = new Set<string>();

    for (const action of actions) {
        const fn = input.catalog.resolve(action.functionName);
        if (!fn) {
            metrics.inc(METRIC_ACTIONS_SKIPPED);
            continue;
        }
        const params = completeParameters(
            { functionName: fn.name, inputs: fn.inputs, analysis: input.analysis, description: input.description },
            action.params,
        );
        const key = `${fn.name}:${toJson(params)}`;
        if (seen.has(key)) continue;
        seen.add(key);
        admitted.push({
            functionName: fn.name,
            params,
            message: action.message || defaultMessage(fn.name),
        });
    }
    return admitted;
}
