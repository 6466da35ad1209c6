import React from "react";
import ReactDOM from "react-dom/client";
import App from "./App";
import ErrorCatcher from "./ErrorCatcher";

// The bundled bank (src/questions.json) is used unless the host page sets
// window.__QUESTIONS__ before this script runs.
const container = document.getElementById("root");
if (!container) throw new Error("Missing #root element");

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <ErrorCatcher>
      <App />
    </ErrorCatcher>
  </React.StrictMode>
);
