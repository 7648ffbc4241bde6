import {
	Animator,
	createLensHelpers,
	cubicInOut,
	delta,
	quatFromRotationZ,
	quatIdentity,
	quatType,
	vec3,
	vec3Type,
	type AnimationNodeInit,
	type Quaternion,
	type Vector3D,
} from "../../src";

interface Sprite {
	translation: Vector3D;
	rotation: Quaternion;
}

const SCALE = 200;
const FRAME = 1 / 60;

const sprite: Sprite = {
	translation: vec3(-SCALE / 2, -SCALE / 2, 0),
	rotation: quatIdentity(),
};

const { fieldLens } = createLensHelpers<Sprite>();
const quarterTurn = quatFromRotationZ(Math.PI / 2);

// One side of the square: move along `direction` while turning a quarter.
// Deltas stack on the live value, so each side also plays backward.
function side(direction: Vector3D): AnimationNodeInit {
	return {
		duration: 1,
		curve: cubicInOut,
		tracks: [delta(vec3Type, direction), delta(quatType, quarterTurn)],
	};
}

const animator = new Animator();
const root = animator.spawn({
	target: sprite,
	lenses: [fieldLens(vec3Type, 'translation'), fieldLens(quatType, 'rotation')],
	driver: { mode: 'pingPong' },
	children: [
		side(vec3(SCALE, 0, 0)),
		side(vec3(0, SCALE, 0)),
		side(vec3(-SCALE, 0, 0)),
		side(vec3(0, -SCALE, 0)),
	],
});

animator.eventBus.subscribe('sequenceCompleted', () => {
	const driver = animator.getDriver(root);
	console.log(`square traced, speed now ${driver?.speed ?? 0}`);
});

for (let frame = 1; frame <= 8 * 60; frame++) {
	animator.update(FRAME);
	if (frame % 15 === 0) {
		const { x, y } = sprite.translation;
		const angle = 2 * Math.atan2(sprite.rotation.z, sprite.rotation.w);
		console.log(`t=${(frame * FRAME).toFixed(2)}s pos=(${x.toFixed(1)}, ${y.toFixed(1)}) angle=${(angle * 180 / Math.PI).toFixed(0)}deg`);
	}
}
