import { EntityType } from "@/shared/constants/EntityEnums";
import { digest, type HashableEntity } from "./ContentHash";

/**
 * A resource shared by many agents (e.g., a public bus or a hospital ward).
 *
 * The API follows the vocabulary of concurrent computing: a resource
 * *accommodates* agents up to its maximum capacity and is *released* once
 * agents are done with it. This implementation is meant for use within a
 * single simulation.
 *
 * Resources are identified by name; two instances with the same name are
 * the same resource.
 */
export class Resource implements HashableEntity {
  /** Number of agents currently accommodated. */
  public capacity: number;
  public readonly capacityMax: number;
  protected hash: string | null = null;

  constructor(
    public readonly name: string,
    capacityMax: number = 1,
    capacity: number = 0,
  ) {
    this.capacityMax = capacityMax;
    this.capacity = capacity;
  }

  public get type(): EntityType {
    return EntityType.RESOURCE;
  }

  public getHash(): string {
    if (this.hash === null) {
      this.hash = digest([EntityType.RESOURCE, this.name]);
    }
    return this.hash;
  }

  public equals(other: unknown): boolean {
    return (
      other instanceof Resource &&
      other.type === this.type &&
      other.getHash() === this.getHash()
    );
  }

  /**
   * Allocates the resource to `n` agents, either all-or-nothing or as many
   * as fit.
   *
   * @returns Number of agents not accommodated
   */
  public allocate(n: number, doAll: boolean = false): number {
    if (doAll) {
      return this.allocateAll(n) ? 0 : n;
    }
    return this.allocateAny(n);
  }

  /**
   * Admits as many of `n` agents as the remaining capacity allows.
   *
   * @returns Number of agents not accommodated
   */
  public allocateAny(n: number): number {
    const admitted = Math.max(0, Math.min(n, this.getCapacityLeft()));
    this.capacity += admitted;
    return n - admitted;
  }

  /**
   * Admits all `n` agents or none of them.
   *
   * @returns True if all agents were accommodated
   */
  public allocateAll(n: number): boolean {
    if (!this.canAccommodateAll(n)) {
      return false;
    }
    this.capacity += n;
    return true;
  }

  public canAccommodateAll(n: number): boolean {
    return this.capacity + n <= this.capacityMax;
  }

  public canAccommodateAny(n: number): boolean {
    return n > 0 && this.capacity < this.capacityMax;
  }

  public canAccommodateOne(): boolean {
    return this.capacity < this.capacityMax;
  }

  public getCapacity(): number {
    return this.capacity;
  }

  public getCapacityLeft(): number {
    return this.capacityMax - this.capacity;
  }

  public getCapacityMax(): number {
    return this.capacityMax;
  }

  /**
   * Releases `n` agent spots. Always allowed; capacity never drops below zero.
   */
  public release(n: number): void {
    this.capacity = Math.max(0, this.capacity - n);
  }

  public toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      name: this.name,
      capacity: this.capacity,
      capacityMax: this.capacityMax,
      hash: this.getHash(),
    };
  }

  public toString(): string {
    return `Resource  name: ${this.name}  cap: ${this.capacity}/${this.capacityMax}  hash: ${this.getHash()}`;
  }
}
