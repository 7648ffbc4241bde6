import {
	Animator,
	createFieldLens,
	decibels,
	keyframe,
	volumeToDecibels,
	volumeType,
	type AnimationNodeInit,
	type Volume,
} from "../../src";

interface VolumeNode {
	name: string;
	volume: Volume;
}

function createVolumeNode(name: string): VolumeNode {
	return { name, volume: decibels(-96) };
}

const FRAME = 1 / 30;
const volumeLens = createFieldLens(volumeType, 'volume');
const animator = new Animator();

// -- A mixed tree: a fade sequence beside a leaf following a sample's clock --

const music = createVolumeNode('music');

const root = animator.spawn({
	composition: 'parallel',
	target: music,
	driver: false,
	children: [
		{
			// Fade up, hold, fade down, then remove the whole sequence
			completion: 'despawn',
			driver: true,
			lenses: [volumeLens],
			children: [
				{ duration: 0.5, tracks: [keyframe(volumeType, decibels(0))] },
				// Hold
				{ composition: 'parallel', children: [{ duration: 0.5 }] },
				{ duration: 0.5, tracks: [keyframe(volumeType, decibels(-24))] },
			],
		},
		{
			// Fires each time the sample plays forward past half a second
			playhead: true,
			driver: false,
			children: [
				{ duration: 0.5, event: { name: 'beat', data: 'half a second in' } },
			],
		},
	],
});

const [fade, sampleFollower] = animator.getChildren(root);

animator.eventBus.subscribe('beat', (data) => {
	console.log(`beat: ${String(data)}`);
});

// -- The simplest animation: one keyframe driven by time --

function fadeIn(seconds: number): AnimationNodeInit {
	return {
		lenses: [volumeLens],
		children: [{ duration: seconds, tracks: [keyframe(volumeType, decibels(0))] }],
	};
}

const ambience = createVolumeNode('ambience');
animator.spawn({ target: ambience, ...fadeIn(1.5) });

// -- A stand-in sample that plays, pauses and rewinds --

let samplePosition = 0;
function advanceSample(frame: number): void {
	if (frame < 20) samplePosition += FRAME;
	else if (frame < 30) samplePosition -= FRAME;
	else samplePosition += FRAME;
}

for (let frame = 1; frame <= 60; frame++) {
	advanceSample(frame);
	if (sampleFollower !== undefined) {
		animator.getPlayhead(sampleFollower)?.set(samplePosition);
	}

	animator.update(FRAME);

	if (frame % 5 === 0) {
		const fading = fade !== undefined && animator.hasNode(fade);
		console.log(
			`t=${(frame * FRAME).toFixed(2)}s`
			+ ` music=${volumeToDecibels(music.volume).toFixed(1)}dB`
			+ ` ambience=${volumeToDecibels(ambience.volume).toFixed(1)}dB`
			+ (fading ? '' : ' (fade removed)'),
		);
	}
}
