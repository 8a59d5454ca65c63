/**
 * Collaborator contracts for the execution loop. The loop only knows these
 * shapes; the Threads and OpenAI clients are one implementation each.
 */

export type GenerationContext = {
	/** Posting date the slot belongs to. */
	date: string;
	slotIndex: number;
	plannedAt: string;
	isPrimeTime: boolean;
	/** Local time of the slot, `YYYY-MM-DD HH:mm`. */
	localTime: string;
	/** Most recent published posts, newest first. */
	recentPosts: string[];
};

export interface ContentGenerator {
	/**
	 * Produce the text for one post. Throws GenerationError for retriable
	 * failures and ContentRejectedError when the content was refused.
	 */
	generate(context: GenerationContext, signal?: AbortSignal): Promise<string>;
}

export type PublishResult = {
	postId: string;
	/** Text as it was sent (after any platform-length truncation). */
	text: string;
};

export interface Publisher {
	readonly serviceId: string;
	/** Publish one text post. Throws PublishError on failure. */
	publish(text: string, signal?: AbortSignal): Promise<PublishResult>;
}
