import { EditorWrapper } from "./components/EditorWrapper";

export function App() {
  return (
    <div className="app">
      <EditorWrapper />
    </div>
  );
}
