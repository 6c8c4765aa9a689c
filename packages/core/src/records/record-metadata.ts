/**
 * Producer acknowledgement for one record.
 */
export interface RecordMetadata {
	readonly topic: string;
	readonly partition: number;
	/**
	 * Log offset assigned by the broker, or -1 when the broker returned none (acks=0)
	 */
	readonly offset: number;
}
