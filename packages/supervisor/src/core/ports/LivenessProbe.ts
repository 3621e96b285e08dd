export interface LivenessProbe {
  /**
   * True only if `pid` names an existing process that is not a zombie.
   * Never throws: missing, inaccessible and defunct processes are all `false`.
   */
  isAlive(pid: number): boolean;
}
