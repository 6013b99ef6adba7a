interface Chronological {
	id: number;
	createdAt: Date;
}

export const newestFirst = (a: Chronological, b: Chronological): number =>
	b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
