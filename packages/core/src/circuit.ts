/**
 * Circuit Builder
 *
 * Declarative description of the gate sequences submitted to a remote
 * execution service. A circuit only records gates; it never simulates them.
 */

// ============================================================================
// Gate Definitions
// ============================================================================

/**
 * Hadamard (basis change) on one qubit
 */
export interface BasisChangeGate {
  type: 'h';
  qubit: number;
}

/**
 * Single-qubit rotation around Z
 */
export interface RotationGate {
  type: 'rz';
  qubit: number;
  angle: number;
}

/**
 * Controlled-NOT (entangling bit flip)
 */
export interface EntanglingGate {
  type: 'cx';
  control: number;
  target: number;
}

/**
 * Controlled rotation around Z
 */
export interface ControlledRotationGate {
  type: 'crz';
  control: number;
  target: number;
  angle: number;
}

/**
 * Toffoli gate (CCNOT): qubits are [control1, control2, target]
 */
export interface ToffoliGate {
  type: 'ccx';
  qubits: readonly [number, number, number];
}

/**
 * Measurement of one qubit into one classical bit
 */
export interface MeasureGate {
  type: 'measure';
  qubit: number;
  clbit: number;
}

/**
 * Union type for all gates
 */
export type Gate =
  | BasisChangeGate
  | RotationGate
  | EntanglingGate
  | ControlledRotationGate
  | ToffoliGate
  | MeasureGate;

export type GateType = Gate['type'];

/**
 * Plain-data form of a circuit
 */
export interface CircuitJSON {
  numQubits: number;
  numClbits: number;
  name?: string;
  gates: readonly Gate[];
}

// ============================================================================
// Circuit Statistics
// ============================================================================

/**
 * Statistics about a circuit
 */
export interface CircuitStats {
  numQubits: number;
  depth: number;
  totalGates: number;
  singleQubitGates: number;
  twoQubitGates: number;
  threeQubitGates: number;
  measurements: number;
  /** Qubits touched by at least one gate, measurements included */
  gateBearingQubits: number;
  /** Distinct classical bits written by measurements */
  clbitsWritten: number;
  gateBreakdown: Record<string, number>;
}

// ============================================================================
// Circuit Class
// ============================================================================

/**
 * Quantum Circuit Builder
 *
 * @example
 * ```typescript
 * const ghz = new Circuit(3)
 *   .h(0)
 *   .cnot(0, 1)
 *   .cnot(1, 2)
 *   .measureAll();
 *
 * console.log(ghz.toQASM());
 * ```
 */
export class Circuit {
  private _numQubits: number;
  private _numClbits: number;
  private _gates: Gate[] = [];
  private _name?: string;

  /**
   * @param numQubits Number of qubits in the circuit
   * @param name Optional name for the circuit
   * @param numClbits Number of classical bits (defaults to numQubits)
   */
  constructor(numQubits: number, name?: string, numClbits: number = numQubits) {
    if (!Number.isInteger(numQubits) || numQubits < 1 || numQubits > 30) {
      throw new Error('numQubits must be between 1 and 30');
    }
    if (!Number.isInteger(numClbits) || numClbits < 1 || numClbits > 30) {
      throw new Error('numClbits must be between 1 and 30');
    }
    this._numQubits = numQubits;
    this._numClbits = numClbits;
    this._name = name;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  get numClbits(): number {
    return this._numClbits;
  }

  get name(): string | undefined {
    return this._name;
  }

  get gates(): readonly Gate[] {
    return this._gates;
  }

  get length(): number {
    return this._gates.length;
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  /**
   * Hadamard gate
   */
  h(qubit: number): this {
    this.validateQubit(qubit);
    this._gates.push({ type: 'h', qubit });
    return this;
  }

  /**
   * Rotation around Z-axis
   */
  rz(qubit: number, angle: number): this {
    this.validateQubit(qubit);
    this.validateAngle(angle);
    this._gates.push({ type: 'rz', qubit, angle });
    return this;
  }

  // =========================================================================
  // Two-Qubit Gates
  // =========================================================================

  /**
   * Controlled-NOT gate
   */
  cnot(control: number, target: number): this {
    this.validateQubit(control);
    this.validateQubit(target);
    this.validateDifferent(control, target);
    this._gates.push({ type: 'cx', control, target });
    return this;
  }

  /**
   * Alias for CNOT
   */
  cx(control: number, target: number): this {
    return this.cnot(control, target);
  }

  /**
   * Controlled Rz gate
   */
  crz(control: number, target: number, angle: number): this {
    this.validateQubit(control);
    this.validateQubit(target);
    this.validateDifferent(control, target);
    this.validateAngle(angle);
    this._gates.push({ type: 'crz', control, target, angle });
    return this;
  }

  // =========================================================================
  // Three-Qubit Gates
  // =========================================================================

  /**
   * Toffoli gate (CCNOT)
   */
  toffoli(control1: number, control2: number, target: number): this {
    this.validateQubit(control1);
    this.validateQubit(control2);
    this.validateQubit(target);
    this.validateAllDifferent([control1, control2, target]);
    this._gates.push({ type: 'ccx', qubits: [control1, control2, target] });
    return this;
  }

  /**
   * Alias for Toffoli
   */
  ccx(control1: number, control2: number, target: number): this {
    return this.toffoli(control1, control2, target);
  }

  // =========================================================================
  // Measurement
  // =========================================================================

  /**
   * Measure a qubit into a classical bit (same index by default)
   */
  measure(qubit: number, clbit: number = qubit): this {
    this.validateQubit(qubit);
    if (!Number.isInteger(clbit) || clbit < 0 || clbit >= this._numClbits) {
      throw new Error(
        `Classical bit ${clbit} out of range [0, ${this._numClbits - 1}]`
      );
    }
    this._gates.push({ type: 'measure', qubit, clbit });
    return this;
  }

  /**
   * Measure every qubit into the classical bit of the same index
   */
  measureAll(): this {
    for (let i = 0; i < this._numQubits; i++) {
      this.measure(i, i);
    }
    return this;
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  getStats(): CircuitStats {
    const gateBreakdown: Record<string, number> = {};
    const touched = new Set<number>();
    const clbits = new Set<number>();
    let singleQubitGates = 0;
    let twoQubitGates = 0;
    let threeQubitGates = 0;
    let measurements = 0;

    for (const gate of this._gates) {
      gateBreakdown[gate.type] = (gateBreakdown[gate.type] ?? 0) + 1;
      for (const q of gateQubits(gate)) {
        touched.add(q);
      }

      switch (gate.type) {
        case 'measure':
          measurements++;
          clbits.add(gate.clbit);
          break;
        case 'h':
        case 'rz':
          singleQubitGates++;
          break;
        case 'cx':
        case 'crz':
          twoQubitGates++;
          break;
        case 'ccx':
          threeQubitGates++;
          break;
      }
    }

    return {
      numQubits: this._numQubits,
      depth: this.calculateDepth(),
      totalGates:
        singleQubitGates + twoQubitGates + threeQubitGates + measurements,
      singleQubitGates,
      twoQubitGates,
      threeQubitGates,
      measurements,
      gateBearingQubits: touched.size,
      clbitsWritten: clbits.size,
      gateBreakdown,
    };
  }

  private calculateDepth(): number {
    const qubitDepths = new Array<number>(this._numQubits).fill(0);

    for (const gate of this._gates) {
      const qubits = gateQubits(gate);
      const maxDepth = Math.max(...qubits.map((q) => qubitDepths[q]));

      for (const q of qubits) {
        qubitDepths[q] = maxDepth + 1;
      }
    }

    return Math.max(...qubitDepths);
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  toJSON(): CircuitJSON {
    return {
      numQubits: this._numQubits,
      numClbits: this._numClbits,
      name: this._name,
      gates: this._gates.map(cloneGate),
    };
  }

  /**
   * Rebuild a circuit from plain data, validating every gate
   */
  static fromJSON(json: CircuitJSON): Circuit {
    const circuit = new Circuit(json.numQubits, json.name, json.numClbits);
    for (const gate of json.gates) {
      circuit.add(gate);
    }
    return circuit;
  }

  /**
   * Convert to OpenQASM 2.0 string
   */
  toQASM(): string {
    const lines: string[] = [
      'OPENQASM 2.0;',
      'include "qelib1.inc";',
      `qreg q[${this._numQubits}];`,
      `creg c[${this._numClbits}];`,
      '',
    ];

    for (const gate of this._gates) {
      lines.push(gateToQASM(gate));
    }

    return lines.join('\n');
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private add(gate: Gate): void {
    switch (gate.type) {
      case 'h':
        this.h(gate.qubit);
        break;
      case 'rz':
        this.rz(gate.qubit, gate.angle);
        break;
      case 'cx':
        this.cnot(gate.control, gate.target);
        break;
      case 'crz':
        this.crz(gate.control, gate.target, gate.angle);
        break;
      case 'ccx':
        this.toffoli(gate.qubits[0], gate.qubits[1], gate.qubits[2]);
        break;
      case 'measure':
        this.measure(gate.qubit, gate.clbit);
        break;
    }
  }

  private validateQubit(qubit: number): void {
    if (!Number.isInteger(qubit) || qubit < 0 || qubit >= this._numQubits) {
      throw new Error(
        `Qubit ${qubit} out of range [0, ${this._numQubits - 1}]`
      );
    }
  }

  private validateAngle(angle: number): void {
    if (!Number.isFinite(angle)) {
      throw new Error(`Rotation angle must be finite, got ${angle}`);
    }
  }

  private validateDifferent(q1: number, q2: number): void {
    if (q1 === q2) {
      throw new Error('Control and target must be different qubits');
    }
  }

  private validateAllDifferent(qubits: number[]): void {
    const unique = new Set(qubits);
    if (unique.size !== qubits.length) {
      throw new Error('All qubits must be different');
    }
  }
}

// ============================================================================
// Gate Helpers
// ============================================================================

/**
 * Qubits a gate acts on, in operand order
 */
export function gateQubits(gate: Gate): readonly number[] {
  switch (gate.type) {
    case 'h':
    case 'rz':
    case 'measure':
      return [gate.qubit];
    case 'cx':
    case 'crz':
      return [gate.control, gate.target];
    case 'ccx':
      return gate.qubits;
  }
}

function cloneGate(gate: Gate): Gate {
  if (gate.type === 'ccx') {
    return { type: 'ccx', qubits: [gate.qubits[0], gate.qubits[1], gate.qubits[2]] };
  }
  return { ...gate };
}

function gateToQASM(gate: Gate): string {
  switch (gate.type) {
    case 'h':
      return `h q[${gate.qubit}];`;
    case 'rz':
      return `rz(${gate.angle}) q[${gate.qubit}];`;
    case 'cx':
      return `cx q[${gate.control}],q[${gate.target}];`;
    case 'crz':
      return `crz(${gate.angle}) q[${gate.control}],q[${gate.target}];`;
    case 'ccx': {
      const [c1, c2, t] = gate.qubits;
      return `ccx q[${c1}],q[${c2}],q[${t}];`;
    }
    case 'measure':
      return `measure q[${gate.qubit}] -> c[${gate.clbit}];`;
  }
}
