/**
 * Minimal in-memory metrics with Prometheus text exposition.
 * Supports labeled counters, gauges and labeled duration histograms.
 */

type LabelSet = { [k: string]: string };
interface Counter { name: string; help?: string; values: Map<string, number>; }
interface Gauge { name: string; help?: string; value: number; }
interface Histogram { name: string; help?: string; buckets: number[]; counts: number[]; sum: number; count: number; labels: LabelSet; }

const counters: Record<string, Counter> = {};
const gauges: Record<string, Gauge> = {};
// histograms are multi-dimensional; one entry per (name, label set)
const histograms: Histogram[] = [];
const histogramHelp: Record<string, string> = {};

const DEFAULT_BUCKETS = [0.1,0.5,1,5,10,30,60,300,900,1800];

function labelKey(labels: LabelSet) { return Object.keys(labels).sort().map(k=>`${k}=${labels[k]}`).join(','); }

export function defineCounter(name: string, help?: string) {
	if (!counters[name]) counters[name] = { name, help, values: new Map() };
}

export function defineGauge(name: string, help?: string) {
	if (!gauges[name]) gauges[name] = { name, help, value: 0 };
}

export function defineHistogram(name: string, help: string) { histogramHelp[name] = help; }

export function incCounter(name: string, labels: LabelSet, delta = 1) {
	const c = counters[name]; if(!c) return;
	const key = labelKey(labels);
	c.values.set(key, (c.values.get(key)||0) + delta);
}

export function addGauge(name: string, delta: number) {
	const g = gauges[name]; if(!g) return;
	g.value += delta;
}

export function observeDuration(name: string, seconds: number, labels: LabelSet) {
	const key = labelKey(labels);
	let h = histograms.find(x => x.name === name && labelKey(x.labels) === key);
	if(!h){
		h = { name, help: histogramHelp[name], labels, buckets: DEFAULT_BUCKETS, counts: new Array<number>(DEFAULT_BUCKETS.length+1).fill(0), sum:0, count:0 };
		histograms.push(h);
	}
	h.sum += seconds; h.count += 1;
	let idx = h.buckets.findIndex(b => seconds <= b);
	if (idx === -1) idx = h.buckets.length;
	h.counts[idx] += 1;
}

/** Current value of a counter for an exact label set (0 when never incremented). */
export function counterValue(name: string, labels: LabelSet): number {
	return counters[name]?.values.get(labelKey(labels)) ?? 0;
}

export function serializePrometheus(): string {
	const lines: string[] = [];
	// Counters
	for (const c of Object.values(counters)) {
		if (c.help) lines.push(`# HELP ${c.name} ${c.help}`);
		lines.push(`# TYPE ${c.name} counter`);
		for (const [k,v] of c.values.entries()) {
			const labels = k.split(',').filter(Boolean).map(pair => pair.split('='));
			const labelStr = labels.length ? '{'+labels.map(([lk,lv])=>`${lk}="${lv}"`).join(',')+'}' : '';
			lines.push(`${c.name}${labelStr} ${v}`);
		}
	}
	// Gauges
	for (const g of Object.values(gauges)) {
		if (g.help) lines.push(`# HELP ${g.name} ${g.help}`);
		lines.push(`# TYPE ${g.name} gauge`);
		lines.push(`${g.name} ${g.value}`);
	}
	// Histogram(s), grouped by name
	const names = [...new Set(histograms.map(h => h.name))];
	for (const name of names) {
		if (histogramHelp[name]) lines.push(`# HELP ${name} ${histogramHelp[name]}`);
		lines.push(`# TYPE ${name} histogram`);
		for (const h of histograms.filter(x => x.name === name)) {
			let cumulative = 0;
			for (let i=0;i<h.buckets.length;i++) {
				cumulative += h.counts[i];
				lines.push(`${h.name}_bucket{${formatLabelSet({...h.labels, le:String(h.buckets[i])})}} ${cumulative}`);
			}
			cumulative += h.counts[h.buckets.length];
			lines.push(`${h.name}_bucket{${formatLabelSet({...h.labels, le:'+Inf'})}} ${cumulative}`);
			lines.push(`${h.name}_sum{${formatLabelSet(h.labels)}} ${h.sum}`);
			lines.push(`${h.name}_count{${formatLabelSet(h.labels)}} ${h.count}`);
		}
	}
	return lines.join('\n') + '\n';
}

// Define core metrics on import
defineCounter('polls_total','Completed polls (labels: mode, outcome)');
defineCounter('lookups_total','Indexed unique lookups (labels: outcome)');
defineCounter('verification_runs_total','Supervisor invocations (labels: outcome)');
defineCounter('verification_tasks_total','Supervised task outcomes (labels: kind, state)');
defineGauge('verification_runs_active','Supervisor invocations currently waiting on tasks');
defineHistogram('verification_duration_seconds','Wall-clock time of a supervisor invocation');

export function resetAllMetrics(){
	for (const c of Object.values(counters)) c.values.clear();
	for (const g of Object.values(gauges)) g.value = 0;
	histograms.splice(0, histograms.length);
}

function formatLabelSet(labels: LabelSet): string { return Object.entries(labels).map(([k,v])=>`${k}="${v}"`).join(','); }
