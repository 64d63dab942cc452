/**
 * The parameterized 8-qubit probe circuit.
 *
 * Four stages: GHZ entanglement, index-weighted phase encoding, a chain of
 * controlled rotations with Toffoli-conjugated phase kicks, and readout.
 * The correlation decay law and the readout layout are selectable policies,
 * recorded on the description.
 */

import { Circuit, type CircuitJSON, type Gate } from './circuit';

export const REGISTER_SIZE = 8;

/**
 * Weight of correlation step i: `halving` is 2^-i, `constant` is 1
 */
export type DecayLaw = 'halving' | 'constant';

/**
 * `cascade` measures qubit pairs as soon as the correlation chain releases
 * them, with a closing Hadamard on the pair's leading qubit; `flat` applies
 * Hadamard to every qubit and measures them together at the end.
 */
export type ReadoutPolicy = 'cascade' | 'flat';

export interface CircuitPolicy {
  decayLaw: DecayLaw;
  readout: ReadoutPolicy;
}

export const DEFAULT_CIRCUIT_POLICY: Readonly<CircuitPolicy> = Object.freeze({
  decayLaw: 'halving',
  readout: 'cascade',
});

/**
 * Immutable circuit handed to an execution client
 */
export interface CircuitDescription extends CircuitJSON {
  readonly name: string;
  readonly parameter: number;
  readonly policy: Readonly<CircuitPolicy>;
}

/**
 * Angle of the controlled rotation at correlation step `step`
 */
export function correlationAngle(
  parameter: number,
  step: number,
  decayLaw: DecayLaw
): number {
  const weight = decayLaw === 'halving' ? Math.pow(2, -step) : 1;
  return parameter * Math.PI * weight;
}

/**
 * Build the probe circuit for one sweep parameter
 */
export function buildCircuit(
  parameter: number,
  policy: Partial<CircuitPolicy> = {}
): CircuitDescription {
  if (!Number.isFinite(parameter)) {
    throw new RangeError(`Parameter must be finite, got ${parameter}`);
  }
  const resolved: CircuitPolicy = { ...DEFAULT_CIRCUIT_POLICY, ...policy };
  const n = REGISTER_SIZE;
  const lastStep = n - 2;
  const circuit = new Circuit(n, `probe(${parameter})`);

  // Entanglement
  circuit.h(0);
  for (let i = 0; i < n - 1; i++) {
    circuit.cnot(i, i + 1);
  }

  // Phase encoding
  for (let i = 0; i < n; i++) {
    circuit.rz(i, parameter * Math.PI * (i + 1));
  }

  // Correlation chain
  for (let i = 0; i <= lastStep; i++) {
    const angle = correlationAngle(parameter, i, resolved.decayLaw);
    circuit.crz(i, i + 1, angle);
    if (i < lastStep) {
      circuit.toffoli(i, i + 1, i + 2);
      circuit.rz(i + 2, angle / 2);
      circuit.toffoli(i, i + 1, i + 2);
    }

    // Step i is the last one touching qubit i, so pair (2k, 2k+1) is free
    // after step 2k+1; the final step frees the last pair.
    if (resolved.readout === 'cascade' && (i % 2 === 1 || i === lastStep)) {
      const lead = i % 2 === 1 ? i - 1 : i;
      readoutPair(circuit, lead);
    }
  }

  if (resolved.readout === 'flat') {
    for (let i = 0; i < n; i++) {
      circuit.h(i);
    }
    circuit.measureAll();
  }

  return describe(circuit, parameter, resolved);
}

function readoutPair(circuit: Circuit, lead: number): void {
  circuit.h(lead);
  circuit.measure(lead, lead);
  circuit.measure(lead + 1, lead + 1);
}

function describe(
  circuit: Circuit,
  parameter: number,
  policy: CircuitPolicy
): CircuitDescription {
  const json = circuit.toJSON();
  const gates: readonly Gate[] = Object.freeze(
    json.gates.map((gate) =>
      Object.freeze(
        gate.type === 'ccx' ? { ...gate, qubits: Object.freeze(gate.qubits) } : gate
      )
    )
  );
  return Object.freeze({
    name: circuit.name ?? 'probe',
    parameter,
    numQubits: json.numQubits,
    numClbits: json.numClbits,
    gates,
    policy: Object.freeze({ ...policy }),
  });
}
