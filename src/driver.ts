import type { Playhead } from "./playhead";

export type DriverState = 'play' | 'pause';

/**
 * What a driver does once its playhead completes the sequence.
 * - `once`: pause
 * - `restart`: jump back to the start (the end, when playing backward)
 * - `pingPong`: reverse direction
 */
export type PlaybackMode = 'once' | 'restart' | 'pingPong';

export interface TimeDriverOptions {
	/** Playback rate; negative plays backward (default: 1) */
	speed?: number;
	/** Initial state (default: 'play') */
	state?: DriverState;
	/** Completion behavior (default: 'once') */
	mode?: PlaybackMode;
}

/**
 * Advances a playhead with wall-clock time.
 */
export class TimeDriver {
	speed: number;
	state: DriverState;
	mode: PlaybackMode;

	constructor(options: TimeDriverOptions = {}) {
		const {
			speed = 1,
			state = 'play',
			mode = 'once',
		} = options;

		this.speed = speed;
		this.state = state;
		this.mode = mode;
	}

	get isPlaying(): boolean {
		return this.state === 'play';
	}

	play(): void {
		this.state = 'play';
	}

	pause(): void {
		this.state = 'pause';
	}

	tick(playhead: Playhead, deltaTime: number): void {
		if (this.state !== 'play') return;
		playhead.set(playhead.position + deltaTime * this.speed);
	}

	/**
	 * React to the playhead completing its sequence of `duration` seconds,
	 * in either direction. Restarting drops whatever time overshot the end
	 * during the tick.
	 */
	complete(playhead: Playhead, duration: number): void {
		switch (this.mode) {
			case 'once':
				this.pause();
				break;
			case 'restart':
				playhead.jumpTo(this.speed < 0 ? duration : 0);
				break;
			case 'pingPong':
				this.speed = -this.speed;
				break;
		}
	}
}

export function createTimeDriver(options?: TimeDriverOptions): TimeDriver {
	return new TimeDriver(options);
}
