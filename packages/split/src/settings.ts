import { logProgress } from "@waysplit/shared/progress"
import { removeTagsPotentiallyWrongAfterSplit } from "./tags"
import type { SplitWayOptions } from "./types"

export const DEFAULT_SPLIT_WAY_OPTIONS: SplitWayOptions = {
	maxSplitDistanceMeters: Number.POSITIVE_INFINITY,
	removeTagsAfterSplit: removeTagsPotentiallyWrongAfterSplit,
	onProgress: logProgress,
}
