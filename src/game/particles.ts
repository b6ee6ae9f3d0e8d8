import { DEATH_BURST_RULES, DEATH_COLORS, PALETTE, TRAIL_RULES } from "../config/game-config";
import type { DeathParticle, Entity, TrailParticle, Vec2 } from "../types";
import { pickRandom, randInRange, randInt, type RandomFn } from "../util/random";

export class TrailParticleSet implements Entity<TrailParticle[]> {
  private readonly random: RandomFn;
  private readonly particles: TrailParticle[] = [];

  constructor(random: RandomFn) {
    this.random = random;
  }

  get size(): number {
    return this.particles.length;
  }

  emit(origin: Vec2): TrailParticle {
    const particle: TrailParticle = {
      position: {
        x: origin.x + TRAIL_RULES.offsetX,
        y: origin.y + randInt(this.random, -TRAIL_RULES.jitterY, TRAIL_RULES.jitterY)
      },
      radius: randInt(this.random, TRAIL_RULES.minRadius, TRAIL_RULES.maxRadius),
      lifetime: randInt(this.random, TRAIL_RULES.minLifetime, TRAIL_RULES.maxLifetime),
      color: PALETTE.trail
    };
    this.particles.push(particle);
    return particle;
  }

  // Trail particles age once per update regardless of dt.
  update(_dtTicks: number): void {
    for (let i = this.particles.length - 1; i >= 0; i -= 1) {
      const particle = this.particles[i];
      particle.lifetime -= 1;
      if (particle.lifetime <= 0) {
        this.particles.splice(i, 1);
        continue;
      }
      particle.position.x += TRAIL_RULES.driftX;
      particle.radius -= TRAIL_RULES.shrink;
      if (particle.radius <= 0) {
        this.particles.splice(i, 1);
      }
    }
  }

  clear(): void {
    this.particles.length = 0;
  }

  snapshot(): TrailParticle[] {
    return this.particles.map((particle) => ({
      ...particle,
      position: { ...particle.position }
    }));
  }
}

export class DeathParticleSet implements Entity<DeathParticle[]> {
  private readonly random: RandomFn;
  private readonly particles: DeathParticle[] = [];

  constructor(random: RandomFn) {
    this.random = random;
  }

  get size(): number {
    return this.particles.length;
  }

  burst(center: Vec2, count: number = DEATH_BURST_RULES.count): void {
    for (let i = 0; i < count; i += 1) {
      this.particles.push({
        position: { x: center.x, y: center.y },
        velocity: {
          x: randInRange(this.random, DEATH_BURST_RULES.minVelocityX, DEATH_BURST_RULES.maxVelocityX),
          y: randInRange(this.random, DEATH_BURST_RULES.minVelocityY, DEATH_BURST_RULES.maxVelocityY)
        },
        size: randInt(this.random, DEATH_BURST_RULES.minSize, DEATH_BURST_RULES.maxSize),
        color: pickRandom(this.random, DEATH_COLORS)
      });
    }
  }

  update(dtTicks: number): void {
    for (let i = this.particles.length - 1; i >= 0; i -= 1) {
      const particle = this.particles[i];
      particle.velocity.y += DEATH_BURST_RULES.gravity * dtTicks;
      particle.position.x += particle.velocity.x * dtTicks;
      particle.position.y += particle.velocity.y * dtTicks;
      particle.size -= DEATH_BURST_RULES.shrink * dtTicks;
      if (particle.size <= 0) {
        this.particles.splice(i, 1);
      }
    }
  }

  clear(): void {
    this.particles.length = 0;
  }

  snapshot(): DeathParticle[] {
    return this.particles.map((particle) => ({
      ...particle,
      position: { ...particle.position },
      velocity: { ...particle.velocity }
    }));
  }
}
