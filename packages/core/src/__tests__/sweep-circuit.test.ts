import { describe, it, expect } from 'vitest';
import { Circuit, gateQubits, type Gate } from '../circuit';
import {
  buildCircuit,
  correlationAngle,
  DEFAULT_CIRCUIT_POLICY,
  REGISTER_SIZE,
} from '../sweep-circuit';
import { sweepParameters } from '../sweep-result';

const stats = (gates: readonly Gate[]) =>
  Circuit.fromJSON({ numQubits: 8, numClbits: 8, gates }).getStats();

describe('buildCircuit', () => {
  it.each(sweepParameters())('uses all 8 qubits and writes all 8 clbits (p=%s)', (p) => {
    const circuit = buildCircuit(p);
    const s = stats(circuit.gates);
    expect(circuit.numQubits).toBe(REGISTER_SIZE);
    expect(circuit.numClbits).toBe(REGISTER_SIZE);
    expect(s.gateBearingQubits).toBe(8);
    expect(s.measurements).toBe(8);
    expect(s.clbitsWritten).toBe(8);
  });

  it('is deterministic', () => {
    expect(buildCircuit(0.75)).toEqual(buildCircuit(0.75));
    expect(buildCircuit(1.3, { decayLaw: 'constant', readout: 'flat' })).toEqual(
      buildCircuit(1.3, { decayLaw: 'constant', readout: 'flat' })
    );
  });

  it('returns a frozen description', () => {
    const circuit = buildCircuit(0.5);
    expect(Object.isFrozen(circuit)).toBe(true);
    expect(Object.isFrozen(circuit.gates)).toBe(true);
    expect(Object.isFrozen(circuit.gates[0])).toBe(true);
    expect(circuit.policy).toEqual(DEFAULT_CIRCUIT_POLICY);
    expect(circuit.parameter).toBe(0.5);
  });

  it('starts with a GHZ preparation', () => {
    const gates = buildCircuit(1).gates.slice(0, 8);
    expect(gates[0]).toEqual({ type: 'h', qubit: 0 });
    for (let i = 0; i < 7; i++) {
      expect(gates[i + 1]).toEqual({ type: 'cx', control: i, target: i + 1 });
    }
  });

  it('encodes the parameter with index-weighted phases', () => {
    const p = 0.4;
    const gates = buildCircuit(p).gates.slice(8, 16);
    gates.forEach((gate, i) => {
      expect(gate).toEqual({ type: 'rz', qubit: i, angle: p * Math.PI * (i + 1) });
    });
  });

  it('halves the correlation angle per step by default', () => {
    const p = 1.2;
    const angles = buildCircuit(p)
      .gates.filter((g) => g.type === 'crz')
      .map((g) => (g.type === 'crz' ? g.angle : Number.NaN));
    expect(angles).toHaveLength(7);
    angles.forEach((angle, i) => {
      expect(angle).toBeCloseTo((p * Math.PI) / 2 ** i, 12);
    });
  });

  it('keeps the full angle under the constant decay law', () => {
    const p = 1.2;
    const crz = buildCircuit(p, { decayLaw: 'constant' }).gates.filter((g) => g.type === 'crz');
    for (const gate of crz) {
      expect(gate).toMatchObject({ angle: p * Math.PI });
    }
  });

  it('conjugates each phase kick with the same Toffoli', () => {
    const p = 0.8;
    const gates = buildCircuit(p).gates;
    const firstCrz = gates.findIndex((g) => g.type === 'crz');
    expect(gates.slice(firstCrz, firstCrz + 4)).toEqual([
      { type: 'crz', control: 0, target: 1, angle: p * Math.PI },
      { type: 'ccx', qubits: [0, 1, 2] },
      { type: 'rz', qubit: 2, angle: (p * Math.PI) / 2 },
      { type: 'ccx', qubits: [0, 1, 2] },
    ]);
    expect(gates.filter((g) => g.type === 'ccx')).toHaveLength(12);
  });

  it('measures each pair as soon as the chain releases it', () => {
    const gates = buildCircuit(0.5).gates;
    expect(gates).toHaveLength(53);

    const measured = gates.flatMap((g, index) => (g.type === 'measure' ? [{ g, index }] : []));
    expect(measured.map(({ g }) => (g.type === 'measure' ? g.clbit : -1))).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7,
    ]);

    // pair (0, 1) is read out before correlation step 2 starts
    const firstMeasure = measured[0].index;
    const crz23 = gates.findIndex((g) => g.type === 'crz' && g.control === 2);
    expect(firstMeasure).toBeLessThan(crz23);

    // closing Hadamard on each pair's leading qubit, plus the GHZ one
    expect(gates.filter((g) => g.type === 'h').map((g) => gateQubits(g)[0])).toEqual([
      0, 0, 2, 4, 6,
    ]);
  });

  it.each(['cascade', 'flat'] as const)('never touches a qubit after measuring it (%s)', (readout) => {
    const gates = buildCircuit(1.5, { readout }).gates;
    gates.forEach((gate, index) => {
      if (gate.type !== 'measure') return;
      const later = gates.slice(index + 1).filter((g) => g.type !== 'measure');
      for (const g of later) {
        expect(gateQubits(g)).not.toContain(gate.qubit);
      }
    });
  });

  it('flat readout applies Hadamard everywhere and measures at the end', () => {
    const gates = buildCircuit(0.5, { readout: 'flat' }).gates;
    expect(gates).toHaveLength(57);
    expect(gates.slice(-16, -8)).toEqual(
      Array.from({ length: 8 }, (_, qubit) => ({ type: 'h', qubit }))
    );
    expect(gates.slice(-8)).toEqual(
      Array.from({ length: 8 }, (_, qubit) => ({ type: 'measure', qubit, clbit: qubit }))
    );
  });

  it('degenerates rotations to identity at parameter 0 but keeps entanglement', () => {
    const gates = buildCircuit(0).gates;
    for (const gate of gates) {
      if (gate.type === 'rz' || gate.type === 'crz') {
        expect(gate.angle).toBe(0);
      }
    }
    expect(gates.filter((g) => g.type === 'cx')).toHaveLength(7);
  });

  it('rejects non-finite parameters', () => {
    expect(() => buildCircuit(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });

  it('exports to QASM', () => {
    const qasm = Circuit.fromJSON(buildCircuit(0.5)).toQASM().split('\n');
    expect(qasm.slice(0, 4)).toEqual([
      'OPENQASM 2.0;',
      'include "qelib1.inc";',
      'qreg q[8];',
      'creg c[8];',
    ]);
    expect(qasm[qasm.length - 1]).toBe('measure q[7] -> c[7];');
  });
});

describe('correlationAngle', () => {
  it('follows the decay law', () => {
    expect(correlationAngle(1, 0, 'halving')).toBe(Math.PI);
    expect(correlationAngle(1, 3, 'halving')).toBe(Math.PI / 8);
    expect(correlationAngle(1, 3, 'constant')).toBe(Math.PI);
  });
});
