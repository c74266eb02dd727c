import { Route, Timer, LineChart } from 'lucide-react';
import TraceAnalyzer from '@/components/TraceAnalyzer';

const steps = [
  { icon: Route, title: 'Trace', text: 'traceroute runs against the destination, once per sample.' },
  { icon: Timer, title: 'Repeat', text: 'Samples are taken one after another at a fixed interval.' },
  { icon: LineChart, title: 'Compare', text: 'Average RTT per hop is plotted, one line per sample.' },
];

export default function Home() {
  return (
    <main className="min-h-screen bg-slate-100 p-4 md:p-8 font-sans">
      <div className="max-w-7xl mx-auto space-y-6">
        <header className="pb-6 border-b border-slate-200 space-y-4">
          <h1 className="text-3xl font-extrabold text-slate-900 tracking-tight flex items-center gap-3">
            <span className="inline-flex items-center justify-center w-10 h-10 rounded-lg bg-blue-600 text-white">
              <Route className="w-5 h-5" />
            </span>
            Traceroute Trends
          </h1>
          <ol className="grid grid-cols-1 md:grid-cols-3 gap-3">
            {steps.map(({ icon: Icon, title, text }, idx) => (
              <li key={title} className="flex items-start gap-3 bg-white border border-slate-200 rounded-lg p-3">
                <Icon className="w-4 h-4 mt-0.5 text-blue-600 shrink-0" />
                <div>
                  <p className="text-sm font-semibold text-slate-800">{idx + 1}. {title}</p>
                  <p className="text-xs text-slate-500">{text}</p>
                </div>
              </li>
            ))}
          </ol>
        </header>

        <TraceAnalyzer />
      </div>
    </main>
  );
}
