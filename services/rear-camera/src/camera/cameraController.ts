import { sleep } from '@fleet/heartbeat';
import type { ServiceLogger } from '../observability/logging';
import { CameraBusyError } from './errors';

export type CameraPosition = 'up' | 'down' | 'middle';
export type CameraAction = 'move_up' | 'move_down' | 'reset_position';

export interface MovementResult {
  action: CameraAction;
  result: 'completed' | 'already_at_position';
  current_position: CameraPosition;
  duration_ms: number;
  timestamp: string;
}

export interface CameraStatus {
  current_position: CameraPosition;
  is_moving: boolean;
  last_movement: string | null;
  movement_count: number;
  movement_duration_ms: number;
}

export interface CameraControllerOptions {
  moveDurationMs: number;
  logger?: ServiceLogger;
  now?: () => Date;
}

/**
 * Simulated actuator for the rear camera. One movement at a time; a second
 * request while moving is refused rather than queued.
 */
export class CameraController {
  private position: CameraPosition = 'middle';
  private moving = false;
  private lastMovement: Date | null = null;
  private movementCount = 0;
  private readonly now: () => Date;

  constructor(private readonly options: CameraControllerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get isMoving(): boolean {
    return this.moving;
  }

  moveUp(): Promise<MovementResult> {
    return this.moveTo('up', 'move_up', true);
  }

  moveDown(): Promise<MovementResult> {
    return this.moveTo('down', 'move_down', true);
  }

  /** Always travels back to middle, even when already there. */
  reset(): Promise<MovementResult> {
    return this.moveTo('middle', 'reset_position', false);
  }

  status(): CameraStatus {
    return {
      current_position: this.position,
      is_moving: this.moving,
      last_movement: this.lastMovement?.toISOString() ?? null,
      movement_count: this.movementCount,
      movement_duration_ms: this.options.moveDurationMs
    };
  }

  private async moveTo(target: CameraPosition, action: CameraAction, skipWhenThere: boolean): Promise<MovementResult> {
    if (this.moving) {
      throw new CameraBusyError(action);
    }

    if (skipWhenThere && this.position === target) {
      this.options.logger?.info({ action, position: target }, 'camera_already_at_position');
      return {
        action,
        result: 'already_at_position',
        current_position: target,
        duration_ms: 0,
        timestamp: this.now().toISOString()
      };
    }

    this.moving = true;
    const startedAt = this.now();
    this.options.logger?.info({ action, from: this.position, to: target }, 'camera_move_started');
    try {
      await sleep(this.options.moveDurationMs);
      this.position = target;
      this.movementCount += 1;
      const finishedAt = this.now();
      this.lastMovement = finishedAt;
      const durationMs = finishedAt.getTime() - startedAt.getTime();
      this.options.logger?.info(
        { action, position: target, durationMs, movementCount: this.movementCount },
        'camera_move_completed'
      );
      return {
        action,
        result: 'completed',
        current_position: target,
        duration_ms: durationMs,
        timestamp: finishedAt.toISOString()
      };
    } finally {
      this.moving = false;
    }
  }
}
