export const NO_REG = -1;

export class PhysicalRegister {
  constructor(public readonly regNum: number = NO_REG, public ready = false) {}

  static none(): PhysicalRegister {
    return new PhysicalRegister(NO_REG, false);
  }

  isNone(): boolean {
    return this.regNum === NO_REG;
  }

  copy(): PhysicalRegister {
    return new PhysicalRegister(this.regNum, this.ready);
  }

  toString(): string {
    if (this.isNone()) return '-';
    return `p${this.regNum}${this.ready ? '+' : '-'}`;
  }
}
