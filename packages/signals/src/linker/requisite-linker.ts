/**
 * Requisite linker: turns level-authored wiring rules into receiver inputs and
 * policies. Runs once, at level load.
 *
 * For each requisite, in order:
 *   1. Find the receivers at the output location. None: skip. More than one:
 *      report a duplicate mapping and use the first (creation order).
 *   2. Wire every sender whose position is required, in sender creation order.
 *   3. Assign the requisite's policy ("none" if omitted).
 * Required positions with no sender are reported as dangling references.
 * Finally every receiver is recomputed so the graph has a state before the
 * first tick.
 *
 * Senders never read receivers, so the graph is bipartite and acyclic by
 * construction.
 */

import type { PositionKey } from "@signalworks/grid";
import { formatPosition, positionKey } from "@signalworks/grid";
import type { DiagnosticSink, LevelDiagnostic } from "../core/diagnostics.js";
import type { ActivationPolicy, PolicyKeyword, Requisite } from "../core/types.js";
import type { SignalNetwork } from "../network/signal-network.js";

/**
 * Outcome of linking a level.
 */
export interface LinkReport {
  /** Requisites that found a receiver */
  applied: number;
  /** Requisites whose output location had no receiver */
  skipped: number;
  /** Output locations with more than one receiver */
  duplicateMappings: PositionKey[];
  /** Required positions with no sender, per output */
  danglingReferences: Array<{ output: PositionKey; input: PositionKey }>;
  /** Warnings raised while linking (also sent to the sink) */
  diagnostics: LevelDiagnostic[];
}

/**
 * Build the policy a requisite assigns.
 */
export function policyFromRequisite(requisite: Requisite): ActivationPolicy {
  const keyword: PolicyKeyword = requisite.requisite ?? "none";
  switch (keyword) {
    case "none":
      return { type: "none" };
    case "any":
      return { type: "any" };
    case "all":
      return { type: "all", required: [...requisite.requiredInputs] };
  }
}

/**
 * Wire requisites into the network and establish initial receiver states.
 */
export function linkRequisites(
  requisites: readonly Requisite[],
  network: SignalNetwork,
  sink?: DiagnosticSink,
): LinkReport {
  const report: LinkReport = {
    applied: 0,
    skipped: 0,
    duplicateMappings: [],
    danglingReferences: [],
    diagnostics: [],
  };
  const warn = (diagnostic: LevelDiagnostic) => {
    report.diagnostics.push(diagnostic);
    sink?.report(diagnostic);
  };

  for (const requisite of requisites) {
    const outputs = network.receiversAt(requisite.outputLocation);
    const output = outputs[0];
    if (output === undefined) {
      report.skipped++;
      continue;
    }
    if (outputs.length > 1) {
      report.duplicateMappings.push(output.key);
      warn({
        severity: "warning",
        code: "duplicate-mapping",
        message:
          `The level configuration has duplicate mappings for the output at ` +
          `${formatPosition(requisite.outputLocation)}; using the first receiver.`,
        position: requisite.outputLocation,
      });
    }

    const required = new Set(requisite.requiredInputs.map(positionKey));
    for (const sender of network.senders) {
      if (required.has(sender.key)) {
        output.wire(sender.key);
      }
    }
    for (const input of requisite.requiredInputs) {
      if (network.getSenderAt(input) === undefined) {
        report.danglingReferences.push({ output: output.key, input: positionKey(input) });
        warn({
          severity: "warning",
          code: "dangling-reference",
          message:
            `Requisite for ${formatPosition(requisite.outputLocation)} requires a sender at ` +
            `${formatPosition(input)}, but there is none.`,
          position: input,
        });
      }
    }

    output.setPolicy(policyFromRequisite(requisite));
    report.applied++;
  }

  network.recomputeReceivers();
  return report;
}
