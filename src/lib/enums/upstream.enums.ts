/**
 * External systems a roster entry can be matched against.
 */
export enum UpstreamSource {
	TRACKER = 'tracker',
	HR = 'hr',
}
