export abstract class StateAutomaton<S, I> {
  public abstract get states(): readonly S[];

  public abstract toString(): string;

  /**
   * Consume one input symbol and step to the next configuration.
   * @return {boolean} true if successful (the transition is defined),
   *   false otherwise (machine halted)
   */
  public abstract step(symbol: I): boolean;

  public abstract get isHalted(): boolean;

  public abstract get isAccepting(): boolean;
}
