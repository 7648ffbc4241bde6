import {
	Animator,
	colorType,
	createLensHelpers,
	cubicInOut,
	keyframe,
	quarticInOut,
	rgba,
	vec3,
	vec3Type,
	type Color,
	type Vector3D,
} from "../../src";

// -- Scene --

interface TextLabel {
	name: string;
	translation: Vector3D;
	color: Color;
}

function createLabel(name: string): TextLabel {
	return {
		name,
		translation: vec3(0, 0, 0),
		color: rgba(1, 1, 1, 0),
	};
}

const { fieldLens } = createLensHelpers<TextLabel>();
const translation = fieldLens(vec3Type, 'translation');
const color = fieldLens(colorType, 'color');

const FRAME = 1 / 60;
const RISE = vec3(0, 100, 0);

const animator = new Animator();
const title = createLabel('title');
const shadows: TextLabel[] = [];

// -- Shadow loops, started once the title settles --

function spawnShadow(offset: number): void {
	const shadow = createLabel(`shadow ${offset}`);
	shadow.translation = RISE;
	shadow.color = rgba(1, 1, 1, 0.5);
	shadows.push(shadow);

	animator.spawn({
		target: shadow,
		lenses: [translation, color],
		driver: { mode: 'restart' },
		children: [
			{
				composition: 'parallel',
				children: [
					{ duration: 0.75, curve: cubicInOut, tracks: [keyframe(vec3Type, vec3(offset * 4, 100 - offset * 4, 0))] },
					{ duration: 0.75, curve: cubicInOut, tracks: [keyframe(colorType, rgba(1, 1, 1, 0))] },
				],
			},
		],
	});
}

// -- Title fade and rise --

animator.spawn({
	target: title,
	lenses: [translation, color],
	children: [
		// Delay
		{ duration: 0.25 },
		{
			composition: 'parallel',
			children: [
				{ duration: 1.3, curve: quarticInOut, tracks: [keyframe(vec3Type, RISE)] },
				{ duration: 1.3, curve: quarticInOut, tracks: [keyframe(colorType, rgba(1, 1, 1, 1))] },
			],
		},
		{
			callback: () => {
				for (let i = 1; i <= 3; i++) spawnShadow(i);
			},
		},
	],
});

animator.eventBus.subscribe('sequenceCompleted', ({ playhead }) => {
	console.log(`sequence ${playhead} completed`);
});

// -- Fixed-step loop --

for (let frame = 1; frame <= 180; frame++) {
	animator.update(FRAME);

	if (frame % 30 === 0) {
		const { y } = title.translation;
		console.log(`t=${(frame * FRAME).toFixed(2)}s title y=${y.toFixed(1)} alpha=${title.color.a.toFixed(2)}`);
		for (const shadow of shadows) {
			console.log(`  ${shadow.name} y=${shadow.translation.y.toFixed(1)} alpha=${shadow.color.a.toFixed(2)}`);
		}
	}
}
